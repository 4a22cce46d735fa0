export {
  ROLE_PERMISSIONS,
  matchPermission,
  getRolePermissions,
  hasPermission,
} from './engine';
export { requirePermission } from './middleware';
