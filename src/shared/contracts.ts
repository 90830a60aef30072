export type ComponentId = 'luma' | 'godmode9';

export type OperationKind = ComponentId | 'dump';

export type ProgressSeverity = 'info' | 'warning' | 'error' | 'success';

export interface ProgressEvent {
  operation: OperationKind;
  message: string;
  percent: number;
  severity: ProgressSeverity;
  timestamp: string;
}

export type ProgressListener = (event: ProgressEvent) => void;

export type OperationErrorCode =
  | 'network_error'
  | 'data_format'
  | 'asset_not_found'
  | 'not_found'
  | 'format_error'
  | 'corrupt_archive'
  | 'required_file_missing'
  | 'source_not_found'
  | 'unexpected';

export interface OperationResult {
  ok: boolean;
  message: string;
  errorCode: OperationErrorCode | null;
}

export interface ReleaseInfo {
  version: string;
  downloadUrl: string;
  tagName: string;
  assetName: string;
}

export type ReleaseLookupResult =
  | { ok: true; release: ReleaseInfo }
  | { ok: false; errorCode: OperationErrorCode; message: string };

export type InventoryMissingElement = 'device' | 'directory' | 'file';

export interface InventoryError {
  code: Extract<OperationErrorCode, 'not_found' | 'format_error'>;
  missing: InventoryMissingElement | null;
  message: string;
}

export interface LumaInstallation {
  component: 'luma';
  version: string | null;
  error: InventoryError | null;
}

export type GodMode9Presence = 'installed' | 'not_found' | 'error';

export interface GodMode9Installation {
  component: 'godmode9';
  presence: GodMode9Presence;
  error: InventoryError | null;
}

export type InstallationStatus = LumaInstallation | GodMode9Installation;

export type ComponentVerdict =
  | 'update_available'
  | 'up_to_date'
  | 'local_newer'
  | 'install_recommended'
  | 'comparison_unavailable';

export interface ComponentStatus {
  component: ComponentId;
  local: InstallationStatus;
  latest: ReleaseLookupResult;
  verdict: ComponentVerdict;
  updateOffered: boolean;
  summary: string;
}

export interface StatusReport {
  deviceRoot: string;
  checkedAt: string;
  luma: ComponentStatus;
  godmode9: ComponentStatus;
}

export interface DumpTarget {
  key: string;
  sourcePath: string;
  displayName: string;
}

export interface DumpFileResult extends OperationResult {
  target: DumpTarget;
  destinationPath: string | null;
}

export interface DumpBatchResult {
  total: number;
  succeeded: number;
  results: DumpFileResult[];
}

export interface AppConfig {
  deviceRoot: string;
  dumpDir: string;
  apiBaseUrl: string;
  userAgent: string;
}
