// Orchestration-specific types
import {
  OrchestrationErrorInfo,
  ReadinessKind,
  ReadinessMethod,
  ServiceRole,
  StackName,
  StackTarget
} from '../types/index.js';
import { ProbeOutcome, ReadinessTarget } from '../readiness/prober.js';

export interface PhaseGate {
  service: string;
  role: ServiceRole;
  /** Absent for the automation service */
  stack?: StackName;
  method: ReadinessMethod;
  target: ReadinessTarget;
  timeoutMs: number;
}

export interface StartupPhase {
  index: number;
  name: string;
  services: string[];
  /** Stacks whose services in this phase are told not to run migrations */
  skipMigrationsFor: StackName[];
  gates: PhaseGate[];
}

export interface StartupPlan {
  target: StackTarget;
  intervalMs: number;
  phases: StartupPhase[];
}

export interface GateReport {
  service: string;
  method: ReadinessKind;
  outcome: ProbeOutcome;
  attempts: number;
  elapsedMs: number;
}

export interface PhaseReport {
  index: number;
  name: string;
  services: string[];
  startedAt: Date;
  durationMs: number;
  gates: GateReport[];
}

export interface StartupMetadata {
  runId: string;
  timestamp: Date;
  durationMs?: number;
  project: string;
  target: StackTarget;
}

export interface StartupResult {
  success: boolean;
  phases: PhaseReport[];
  errors?: OrchestrationErrorInfo[];
  metadata: StartupMetadata;
}

export interface StartupOptions {
  build?: boolean;
}
