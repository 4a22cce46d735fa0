import { and, asc, eq, isNull, or } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { approvalRules, withTenant } from '@expensox/db';
import { parseOrThrow } from '@expensox/shared';
import { listApprovalRulesSchema } from '../validation';
import type { ListApprovalRulesInput } from '../validation';
import { toRuleView } from '../helpers/views';
import type { ApprovalRuleView } from '../helpers/views';

/** With `flowId`, the rules that apply to that flow: its own and the global ones. */
export async function listApprovalRules(input: ListApprovalRulesInput): Promise<ApprovalRuleView[]> {
  const { tenantId, flowId, includeInactive } = parseOrThrow(listApprovalRulesSchema, input);

  return withTenant(tenantId, async (tx) => {
    const conditions: SQL[] = [eq(approvalRules.tenantId, tenantId)];
    if (!includeInactive) conditions.push(eq(approvalRules.isActive, true));
    if (flowId) {
      const scope = or(eq(approvalRules.flowId, flowId), isNull(approvalRules.flowId));
      if (scope) conditions.push(scope);
    }

    const rows = await tx
      .select()
      .from(approvalRules)
      .where(and(...conditions))
      .orderBy(asc(approvalRules.name));
    return rows.map(toRuleView);
  });
}
