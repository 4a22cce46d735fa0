import {
  AuthorizationError,
  ConflictError,
  EXPENSE_EVENTS,
  OPEN_EXPENSE_STATUSES,
  ValidationError,
  generateUlid,
} from '@expensox/shared';
import type {
  EventType,
  ApprovalDecisionStatus,
  ApprovalRuleType,
  ApproverType,
  ExpenseStatus,
  UserRole,
} from '@expensox/shared';

// ── Types ───────────────────────────────────────────────────────────────────

export interface FlowStepDefinition {
  sequence: number;
  name: string;
  approverType: ApproverType;
  approverUserId: string | null;
  approverRole: string | null;
}

export interface ApprovalFlowDefinition {
  id: string;
  name: string;
  isManagerApprover: boolean;
  /** Company-currency threshold; null counts as 0. */
  minAmount: number | null;
  isDefault: boolean;
  isActive: boolean;
  createdAt: string;
  steps: FlowStepDefinition[];
}

export interface DirectoryUser {
  id: string;
  role: UserRole;
  status: string;
  managerId: string | null;
}

export interface PlannedStep {
  stepNumber: number;
  name: string;
  approverType: ApproverType;
  approverUserId: string | null;
  approverRole: string | null;
  candidateUserIds: string[];
}

export interface ApprovalRuleDefinition {
  id: string;
  name: string;
  flowId: string | null;
  ruleType: ApprovalRuleType;
  percentageThreshold: number | null;
  specificApproverId: string | null;
  isActive: boolean;
}

export interface ApprovalRow {
  id: string;
  stepNumber: number;
  stepName: string;
  approverType: ApproverType;
  approverUserId: string | null;
  approverRole: string | null;
  status: ApprovalDecisionStatus;
  actedBy: string | null;
  comment: string | null;
  actedAt: Date | null;
}

export interface RuleEvaluation {
  satisfied: boolean;
  ruleId: string | null;
  reason: string | null;
}

export interface ApprovalState {
  expense: {
    id: string;
    status: ExpenseStatus;
    submitterUserId: string;
  };
  approvals: ApprovalRow[];
  /** Rules already narrowed to the expense's flow. */
  rules: ApprovalRuleDefinition[];
}

export interface DecisionInput {
  actorId: string;
  actorRole: UserRole;
  decision: 'approve' | 'reject';
  comment?: string | null;
  now: Date;
}

export interface OverrideInput {
  actorId: string;
  decision: 'approve' | 'reject';
  comment: string;
  now: Date;
}

export type ApprovalChange =
  | { kind: 'update'; row: ApprovalRow }
  | { kind: 'insert'; row: ApprovalRow };

export interface EngineEvent {
  eventType: EventType;
  data: Record<string, unknown>;
}

export interface DecisionOutcome {
  status: ExpenseStatus;
  currentStep: number | null;
  finalDecision: 'approved' | 'rejected' | null;
  approvals: ApprovalRow[];
  changes: ApprovalChange[];
  rule: RuleEvaluation | null;
  events: EngineEvent[];
}

/** Step number of entries recorded outside the planned sequence. */
export const OUT_OF_SEQUENCE_STEP = 0;

// ── Flow selection ──────────────────────────────────────────────────────────

/**
 * The active flow with the highest threshold the amount reaches. Ties go to
 * the default flow, then the oldest.
 */
export function selectApprovalFlow<T extends ApprovalFlowDefinition>(
  flows: readonly T[],
  amountInCompanyCurrency: number,
): T | null {
  let best: T | null = null;
  for (const flow of flows) {
    if (!flow.isActive) continue;
    const threshold = flow.minAmount ?? 0;
    if (threshold > amountInCompanyCurrency) continue;
    if (!best || compareFlows(flow, best) < 0) best = flow;
  }
  return best;
}

function compareFlows(a: ApprovalFlowDefinition, b: ApprovalFlowDefinition): number {
  const byThreshold = (b.minAmount ?? 0) - (a.minAmount ?? 0);
  if (byThreshold !== 0) return byThreshold;
  if (a.isDefault !== b.isDefault) return a.isDefault ? -1 : 1;
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

// ── Plan building ───────────────────────────────────────────────────────────

type DraftStep = Omit<PlannedStep, 'stepNumber'>;

export function buildApprovalPlan(input: {
  flow: ApprovalFlowDefinition | null;
  submitter: { id: string; managerId: string | null };
  users: readonly DirectoryUser[];
}): PlannedStep[] {
  const { flow, submitter, users } = input;
  const active = users.filter((u) => u.status === 'active');
  const activeIds = new Set(active.map((u) => u.id));
  const managerId =
    submitter.managerId && activeIds.has(submitter.managerId) ? submitter.managerId : null;

  const managerStep = (name: string): DraftStep => ({
    name,
    approverType: 'manager',
    approverUserId: managerId,
    approverRole: null,
    candidateUserIds: managerId ? [managerId] : [],
  });

  const roleStep = (name: string, role: string): DraftStep => ({
    name,
    approverType: 'role',
    approverUserId: null,
    approverRole: role,
    candidateUserIds: active
      .filter((u) => u.role === role)
      .map((u) => u.id)
      .sort(),
  });

  const drafts: DraftStep[] = [];

  if (!flow) {
    drafts.push(managerId ? managerStep('Manager') : roleStep('Admin', 'admin'));
  } else {
    if (flow.isManagerApprover && managerId) {
      drafts.push(managerStep('Manager'));
    }
    const ordered = [...flow.steps].sort((a, b) => a.sequence - b.sequence);
    for (const step of ordered) {
      switch (step.approverType) {
        case 'manager':
          drafts.push(managerStep(step.name));
          break;
        case 'user': {
          const userId =
            step.approverUserId && activeIds.has(step.approverUserId) ? step.approverUserId : null;
          drafts.push({
            name: step.name,
            approverType: 'user',
            approverUserId: step.approverUserId,
            approverRole: null,
            candidateUserIds: userId ? [userId] : [],
          });
          break;
        }
        case 'role':
          drafts.push(roleStep(step.name, step.approverRole ?? 'admin'));
          break;
      }
    }
  }

  const plan: DraftStep[] = [];
  for (const draft of drafts) {
    const candidates = draft.candidateUserIds.filter((id) => id !== submitter.id);
    if (candidates.length === 0) continue;

    const previous = plan[plan.length - 1];
    if (
      previous &&
      candidates.length === 1 &&
      previous.candidateUserIds.length === 1 &&
      previous.candidateUserIds[0] === candidates[0]
    ) {
      continue;
    }
    plan.push({ ...draft, candidateUserIds: candidates });
  }

  return plan.map((step, index) => ({ ...step, stepNumber: index + 1 }));
}

/** Approval rows for a fresh submission: the first step pending, the rest waiting. */
export function materializePlan(plan: readonly PlannedStep[]): ApprovalRow[] {
  return plan.map((step, index) => ({
    id: generateUlid(),
    stepNumber: step.stepNumber,
    stepName: step.name,
    approverType: step.approverType,
    approverUserId: step.approverUserId,
    approverRole: step.approverRole,
    status: index === 0 ? 'pending' : 'waiting',
    actedBy: null,
    comment: null,
    actedAt: null,
  }));
}

// ── Authorization ───────────────────────────────────────────────────────────

export function canActOnStep(
  step: Pick<ApprovalRow, 'approverUserId' | 'approverRole'>,
  userId: string,
  userRole: UserRole,
): boolean {
  if (step.approverUserId) return step.approverUserId === userId;
  if (step.approverRole) return step.approverRole === userRole;
  return false;
}

// ── Rules ───────────────────────────────────────────────────────────────────

/** Active rules that name this flow, plus the global ones. */
export function applicableRules<T extends ApprovalRuleDefinition>(
  rules: readonly T[],
  flowId: string | null,
): T[] {
  return rules.filter((r) => r.isActive && (r.flowId === null || r.flowId === flowId));
}

export function evaluateRules(
  rules: readonly ApprovalRuleDefinition[],
  decisions: ReadonlyArray<Pick<ApprovalRow, 'stepNumber' | 'status' | 'actedBy'>>,
  totalSteps: number,
): RuleEvaluation {
  const approvedSteps = decisions.filter(
    (d) => d.status === 'approved' && d.stepNumber > OUT_OF_SEQUENCE_STEP,
  ).length;
  const percent = totalSteps > 0 ? (approvedSteps / totalSteps) * 100 : 0;

  for (const rule of rules) {
    if (!rule.isActive) continue;

    const meetsPercentage =
      rule.percentageThreshold !== null && totalSteps > 0 && percent >= rule.percentageThreshold;
    const specificApproved =
      rule.specificApproverId !== null &&
      decisions.some((d) => d.status === 'approved' && d.actedBy === rule.specificApproverId);

    const percentageReason = `${approvedSteps} of ${totalSteps} steps approved (${percent.toFixed(1)}% ≥ ${rule.percentageThreshold ?? 0}%)`;
    const specificReason = 'approved by the designated approver';

    if ((rule.ruleType === 'percentage' || rule.ruleType === 'hybrid') && meetsPercentage) {
      return { satisfied: true, ruleId: rule.id, reason: `${rule.name}: ${percentageReason}` };
    }
    if ((rule.ruleType === 'specific' || rule.ruleType === 'hybrid') && specificApproved) {
      return { satisfied: true, ruleId: rule.id, reason: `${rule.name}: ${specificReason}` };
    }
  }

  return { satisfied: false, ruleId: null, reason: null };
}

function isSpecificApprover(rules: readonly ApprovalRuleDefinition[], userId: string): boolean {
  return rules.some(
    (r) =>
      r.isActive &&
      (r.ruleType === 'specific' || r.ruleType === 'hybrid') &&
      r.specificApproverId === userId,
  );
}

// ── Decisions ───────────────────────────────────────────────────────────────

function isOpen(row: ApprovalRow): boolean {
  return row.status === 'waiting' || row.status === 'pending';
}

function assertDecidable(state: ApprovalState, actorId: string): void {
  if (!OPEN_EXPENSE_STATUSES.includes(state.expense.status)) {
    throw new ValidationError(
      `Cannot decide on an expense in '${state.expense.status}' status`,
    );
  }
  if (actorId === state.expense.submitterUserId) {
    throw new AuthorizationError('You cannot approve or reject your own expense');
  }
}

/** Marks every other open row skipped; returns the full list and the touched rows. */
function closeOpenSteps(
  rows: ApprovalRow[],
  keepId: string | null,
): { rows: ApprovalRow[]; touched: ApprovalRow[] } {
  const touched: ApprovalRow[] = [];
  const next = rows.map((row) => {
    if (row.id === keepId || !isOpen(row)) return row;
    const skipped: ApprovalRow = { ...row, status: 'skipped' };
    touched.push(skipped);
    return skipped;
  });
  return { rows: next, touched };
}

function recordedEvent(
  state: ApprovalState,
  row: ApprovalRow,
  decision: 'approved' | 'rejected',
): EngineEvent {
  return {
    eventType: EXPENSE_EVENTS.APPROVAL_RECORDED,
    data: {
      expenseId: state.expense.id,
      stepNumber: row.stepNumber,
      stepName: row.stepName,
      decision,
      actedBy: row.actedBy,
      comment: row.comment,
    },
  };
}

function requestedEvent(state: ApprovalState, row: ApprovalRow): EngineEvent {
  return {
    eventType: EXPENSE_EVENTS.APPROVAL_REQUESTED,
    data: {
      expenseId: state.expense.id,
      submitterUserId: state.expense.submitterUserId,
      stepNumber: row.stepNumber,
      stepName: row.stepName,
      approverUserId: row.approverUserId,
      approverRole: row.approverRole,
    },
  };
}

function finalEvent(
  state: ApprovalState,
  decision: 'approved' | 'rejected',
  actorId: string,
  extra: Record<string, unknown>,
): EngineEvent {
  return {
    eventType: decision === 'approved' ? EXPENSE_EVENTS.APPROVED : EXPENSE_EVENTS.REJECTED,
    data: {
      expenseId: state.expense.id,
      submitterUserId: state.expense.submitterUserId,
      decidedBy: actorId,
      ...extra,
    },
  };
}

/**
 * Applies one approver's decision. Approvals are sequential: only the
 * pending step's candidates may act, except a rule's specific approver who
 * may approve out of turn.
 */
export function applyDecision(state: ApprovalState, input: DecisionInput): DecisionOutcome {
  assertDecidable(state, input.actorId);

  const alreadyDecided = state.approvals.some(
    (a) => a.actedBy === input.actorId && (a.status === 'approved' || a.status === 'rejected'),
  );
  if (alreadyDecided) {
    throw new ConflictError('You have already decided on this expense');
  }

  const ordered = [...state.approvals].sort((a, b) => a.stepNumber - b.stepNumber);
  const current = ordered.find((a) => a.status === 'pending') ?? null;
  const comment = input.comment?.trim() || null;
  const stamp = { actedBy: input.actorId, comment, actedAt: input.now };

  let acting: ApprovalRow | null = null;
  let inserted = false;

  if (current && canActOnStep(current, input.actorId, input.actorRole)) {
    acting = current;
  } else if (input.decision === 'approve' && isSpecificApprover(state.rules, input.actorId)) {
    acting =
      ordered.find(
        (a) => a.stepNumber > OUT_OF_SEQUENCE_STEP && isOpen(a) && canActOnStep(a, input.actorId, input.actorRole),
      ) ?? null;
    if (!acting) {
      acting = {
        id: generateUlid(),
        stepNumber: OUT_OF_SEQUENCE_STEP,
        stepName: 'Rule approver',
        approverType: 'user',
        approverUserId: input.actorId,
        approverRole: null,
        status: 'waiting',
        actedBy: null,
        comment: null,
        actedAt: null,
      };
      inserted = true;
    }
  }

  if (!acting) {
    throw new AuthorizationError('You are not an approver for the current step');
  }

  const decided: ApprovalRow = {
    ...acting,
    ...stamp,
    status: input.decision === 'approve' ? 'approved' : 'rejected',
  };
  const actingId = acting.id;
  let rows = inserted
    ? [...ordered, decided]
    : ordered.map((row) => (row.id === actingId ? decided : row));
  const changes: ApprovalChange[] = [{ kind: inserted ? 'insert' : 'update', row: decided }];

  if (input.decision === 'reject') {
    const closed = closeOpenSteps(rows, decided.id);
    rows = closed.rows;
    changes.push(...closed.touched.map((row) => ({ kind: 'update' as const, row })));
    return {
      status: 'rejected',
      currentStep: null,
      finalDecision: 'rejected',
      approvals: rows,
      changes,
      rule: null,
      events: [
        recordedEvent(state, decided, 'rejected'),
        finalEvent(state, 'rejected', input.actorId, { reason: comment }),
      ],
    };
  }

  const totalSteps = rows.filter((r) => r.stepNumber > OUT_OF_SEQUENCE_STEP).length;
  const rule = evaluateRules(state.rules, rows, totalSteps);
  const stillPending = rows.find((r) => r.status === 'pending') ?? null;
  const nextWaiting =
    stillPending ??
    rows.find((r) => r.status === 'waiting' && r.stepNumber > decided.stepNumber) ??
    null;

  if (rule.satisfied || !nextWaiting) {
    const closed = closeOpenSteps(rows, decided.id);
    rows = closed.rows;
    changes.push(...closed.touched.map((row) => ({ kind: 'update' as const, row })));
    return {
      status: 'approved',
      currentStep: null,
      finalDecision: 'approved',
      approvals: rows,
      changes,
      rule: rule.satisfied ? rule : null,
      events: [
        recordedEvent(state, decided, 'approved'),
        finalEvent(state, 'approved', input.actorId, {
          ruleId: rule.ruleId,
          reason: rule.reason,
        }),
      ],
    };
  }

  const events: EngineEvent[] = [recordedEvent(state, decided, 'approved')];
  if (nextWaiting.status === 'waiting') {
    const promoted: ApprovalRow = { ...nextWaiting, status: 'pending' };
    rows = rows.map((row) => (row.id === promoted.id ? promoted : row));
    changes.push({ kind: 'update', row: promoted });
    events.push(requestedEvent(state, promoted));
  }
  const pending = rows.find((r) => r.status === 'pending') ?? null;

  return {
    status: 'in_progress',
    currentStep: pending?.stepNumber ?? null,
    finalDecision: null,
    approvals: rows,
    changes,
    rule: null,
    events,
  };
}

/** Admin decision that closes every open step at once. */
export function applyOverride(state: ApprovalState, input: OverrideInput): DecisionOutcome {
  assertDecidable(state, input.actorId);

  const decision = input.decision === 'approve' ? 'approved' : 'rejected';
  const entry: ApprovalRow = {
    id: generateUlid(),
    stepNumber: OUT_OF_SEQUENCE_STEP,
    stepName: 'Admin override',
    approverType: 'role',
    approverUserId: null,
    approverRole: 'admin',
    status: decision,
    actedBy: input.actorId,
    comment: input.comment.trim(),
    actedAt: input.now,
  };

  const closed = closeOpenSteps([...state.approvals], null);
  const changes: ApprovalChange[] = [
    ...closed.touched.map((row) => ({ kind: 'update' as const, row })),
    { kind: 'insert', row: entry },
  ];

  return {
    status: decision,
    currentStep: null,
    finalDecision: decision,
    approvals: [...closed.rows, entry],
    changes,
    rule: null,
    events: [
      recordedEvent(state, entry, decision),
      finalEvent(state, decision, input.actorId, { override: true, reason: entry.comment }),
    ],
  };
}
