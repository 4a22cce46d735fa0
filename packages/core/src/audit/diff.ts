import type { AuditChanges } from './index';

/**
 * Field-level differences between two versions of an entity. Fields missing
 * from `newObj` are not compared.
 *
 *   computeChanges({ amount: 10 }, { amount: 12 })
 *   // { amount: { old: 10, new: 12 } }
 */
export function computeChanges(
  oldObj: Record<string, unknown>,
  newObj: Record<string, unknown>,
  ignoreFields: string[] = ['updatedAt', 'version'],
): AuditChanges | undefined {
  const changes: AuditChanges = {};

  for (const key of Object.keys(newObj)) {
    if (ignoreFields.includes(key)) continue;

    const oldVal = oldObj[key];
    const newVal = newObj[key];

    if (JSON.stringify(oldVal) !== JSON.stringify(newVal)) {
      changes[key] = { old: oldVal, new: newVal };
    }
  }

  return Object.keys(changes).length > 0 ? changes : undefined;
}
