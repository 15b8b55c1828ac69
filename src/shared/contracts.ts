export type UpdateId = string;

export interface UpdateRecord {
  id: UpdateId;
  name: string;
  version: string;
  arch: string;
}

export type PipelineState = 'idle' | 'awaiting-network' | 'refreshing-cache' | 'comparing-versions' | 'installing';

export type ProgressPhase = 'cache' | 'resolve' | 'download' | 'install';

export interface ProgressEvent {
  phase: ProgressPhase;
  percent: number | null;
}

export type UpdaterErrorCode =
  | 'cache_refresh_failed'
  | 'version_compare_failed'
  | 'install_failed'
  | 'no_network'
  | 'clock_not_synced'
  | 'already_running'
  | 'nothing_to_install';

export type CheckFailureCode = Extract<UpdaterErrorCode, 'cache_refresh_failed' | 'version_compare_failed'>;

export type CheckOutcome =
  | { readonly kind: 'up-to-date' }
  | { readonly kind: 'pending'; readonly ids: readonly UpdateId[] }
  | { readonly kind: 'failed'; readonly code: CheckFailureCode; readonly detail: string };

export type StartCheckResult =
  | { ok: true; outcome: CheckOutcome }
  | { ok: false; code: Extract<UpdaterErrorCode, 'already_running'>; message: string };

export type InstallErrorCode = Extract<
  UpdaterErrorCode,
  'install_failed' | 'no_network' | 'clock_not_synced' | 'already_running' | 'nothing_to_install'
>;

export type InstallResult =
  | { ok: true; installed: readonly UpdateId[] }
  | { ok: false; code: InstallErrorCode; message: string };

export interface PendingUpdateRow {
  name: string;
  version: string;
}

export interface UpdaterConfig {
  interval: number;
}

export interface UpdaterSnapshot {
  pipelineState: PipelineState;
  scheduleState: 'idle' | 'awaiting-network';
  iconVisible: boolean;
  lastOutcome: CheckOutcome | null;
  pendingIds: UpdateId[];
  checkedAt: string | null;
  interval: number;
}
