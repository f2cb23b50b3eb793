import type { OperationName, RunStatus, Scope, ScopeSelector } from './models';
import type { RetrievalPolicyDecision } from './policies';

function eventsEnabled(): boolean {
  return (process.env.STRATUM_LOG_EVENTS ?? 'true').toLowerCase() !== 'false';
}

function policyLogEnabled(): boolean {
  return (process.env.STRATUM_LOG_POLICIES ?? 'true').toLowerCase() !== 'false';
}

function baseEvent(event: string, scope: Scope | null) {
  return {
    event,
    timestamp: new Date().toISOString(),
    scope
  };
}

export function logRunStarted(params: {
  runId: string;
  operation: OperationName;
  revisionId: string;
  runner: string;
  scope: Scope | null;
}) {
  if (!eventsEnabled()) {
    return;
  }

  const payload = {
    ...baseEvent('stratum.run.started', params.scope),
    runId: params.runId,
    operation: params.operation,
    revisionId: params.revisionId,
    runner: params.runner
  };

  console.info(JSON.stringify(payload));
}

export function logRunFinished(params: {
  runId: string;
  operation: OperationName;
  scope: Scope | null;
  status: RunStatus;
  durationMs: number;
  errorKind?: string | null;
  failedStep?: string | null;
}) {
  if (!eventsEnabled()) {
    return;
  }

  const payload = {
    ...baseEvent('stratum.run.finished', params.scope),
    runId: params.runId,
    operation: params.operation,
    status: params.status,
    durationMs: Math.round(params.durationMs),
    errorKind: params.errorKind ?? null,
    failedStep: params.failedStep ?? null
  };

  console.info(JSON.stringify(payload));
}

export function logStepFinished(params: {
  runId: string;
  pipeline: string;
  stepId: string;
  status: 'succeeded' | 'failed' | 'skipped';
  attempts: number;
  durationMs: number;
  error?: string | null;
}) {
  if (!eventsEnabled()) {
    return;
  }

  const payload = {
    ...baseEvent('stratum.step.finished', null),
    runId: params.runId,
    pipeline: params.pipeline,
    stepId: params.stepId,
    status: params.status,
    attempts: params.attempts,
    durationMs: Math.round(params.durationMs),
    error: params.error ?? null
  };

  console.info(JSON.stringify(payload));
}

export function logPolicyDecision(params: { selector: ScopeSelector; decision: RetrievalPolicyDecision }) {
  if (!policyLogEnabled()) {
    return;
  }

  const payload = {
    ...baseEvent('stratum.policy.decision', null),
    selector: params.selector,
    allowed: params.decision.allowed,
    violations: params.decision.violations,
    policies: params.decision.appliedPolicies,
    candidateLimit: params.decision.candidateLimit,
    rerankLimit: params.decision.rerankLimit,
    vectorEnabled: params.decision.vectorEnabled,
    fallback: params.decision.fallback,
    combinations: params.decision.boundedCombinations
  };

  console.info(JSON.stringify(payload));
}

export function logVectorMetrics(params: {
  scope: Scope | null;
  backend: string;
  namespace: string;
  latencyMs: number;
  candidateCount: number;
}) {
  if (!eventsEnabled()) {
    return;
  }

  const payload = {
    ...baseEvent('stratum.vector.metrics', params.scope),
    backend: params.backend,
    namespace: params.namespace,
    latencyMs: Math.round(params.latencyMs),
    candidateCount: params.candidateCount
  };

  console.info(JSON.stringify(payload));
}

export function logRequestRejected(params: { operation: OperationName | 'admin'; kind: string; message: string }) {
  if (!eventsEnabled()) {
    return;
  }

  const payload = {
    ...baseEvent('stratum.request.rejected', null),
    operation: params.operation,
    kind: params.kind,
    message: params.message
  };

  console.warn(JSON.stringify(payload));
}

export function logPipelineRevision(params: { pipeline: string; revisionId: string; change: string }) {
  if (!eventsEnabled()) {
    return;
  }

  const payload = {
    ...baseEvent('stratum.pipeline.revision', null),
    pipeline: params.pipeline,
    revisionId: params.revisionId,
    change: params.change
  };

  console.info(JSON.stringify(payload));
}
