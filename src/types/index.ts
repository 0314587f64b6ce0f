import type { ElementSet } from './driver';

export type { ClickOptions, ElementSet, UiDriver } from './driver';

/**
 * The job being applied to. Created once per attempt and never mutated while
 * the wizard runs.
 */
export interface JobContext {
  readonly id: string;
  readonly title: string;
  readonly company: string;
  readonly description: string;
  readonly location: string;
  readonly url?: string;
  /** The caller already clicked the entry control (e.g. from a job card). */
  readonly entryAlreadyTriggered: boolean;
}

/** A queued job as read from the jobs file, before an attempt starts. */
export interface QueuedJob {
  id: string;
  title: string;
  company: string;
  description: string;
  location: string;
  url: string;
}

export type FieldKind = 'text' | 'textarea' | 'select' | 'radio' | 'checkbox' | 'resume';

/** One clickable choice of a radio group. */
export interface ChoiceHandle {
  text: string;
  input: ElementSet;
  label: ElementSet | null;
}

/**
 * A field discovered on the current step. Rebuilt on every step; `handle`
 * points at the field itself (the first element for grouped kinds).
 */
export interface FieldDescriptor {
  label: string;
  kind: FieldKind;
  options: string[];
  handle: ElementSet;
  choices?: ChoiceHandle[];
}

export type OutcomeStatus = 'success' | 'failure' | 'incomplete';

export type FailureCause =
  | 'no-entry-control'
  | 'external-redirect'
  | 'modal-missing'
  | 'loop-detected'
  | 'stuck-navigation'
  | 'max-steps'
  | 'no-continue-control'
  | 'submit-click-failed'
  | 'no-done-control'
  | 'driver-error';

export interface ApplicationOutcome {
  status: OutcomeStatus;
  reason: string;
  timestamp: string;
  job: JobContext;
  cause?: FailureCause;
  steps: number;
}

export interface ApplicationResult {
  success: boolean;
  jobId: string;
  jobTitle: string;
  companyName: string;
  status: OutcomeStatus | 'skipped' | 'duplicate';
  reason?: string;
}

export interface RunSummary {
  attempted: number;
  succeeded: number;
  failed: number;
  incomplete: number;
  skipped: number;
  results: ApplicationResult[];
}
