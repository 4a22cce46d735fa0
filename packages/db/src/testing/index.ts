export { MockTx } from './mock-tx';
export type { Row } from './mock-tx';
