export interface MediaFile {
  name: string;
  size: number;
  /** ISO timestamp of the last modification. */
  modified: string;
  /** Seconds, when a probe could read it. */
  duration?: number;
}

export interface TransferHandle {
  id: string;
  name: string;
}

export interface TransferProgress {
  id: string;
  name: string;
  bytesReceived: number;
  declaredSize: number | null;
  startedAt: string;
}

export interface DiskUsage {
  total: number;
  used: number;
  free: number;
  percentUsed: number;
}
