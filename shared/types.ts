// Polar coordinate as read from a theta-rho file
export interface Coordinate {
  theta: number;
  rho: number;
}

// One wire transmission worth of points
export type Batch = readonly Coordinate[];

// Execution State Types
export enum ExecutionState {
  IDLE = "IDLE",
  RUNNING = "RUNNING",
  COMPLETED = "COMPLETED",
  CANCELLED = "CANCELLED",
  FAILED = "FAILED"
}

export interface ExecutionStatus {
  state: ExecutionState;
  pattern: string | null;
  batchesSent: number;
  totalBatches: number;
  pointsSent: number;
}

export type RunStatus = 'completed' | 'cancelled' | 'noop' | 'failed';

// Wire handshake tokens sent by the controller
export type HandshakeToken = 'READY' | 'DONE';

// Log Entry
export type LogEntryType = 'sent' | 'received' | 'error' | 'info' | 'warning';

export interface LogEntry {
  type: LogEntryType;
  message: string;
  timestamp: Date;
}

export type MessageCallback = (entry: LogEntry) => void;
export type StateCallback = (status: ExecutionStatus) => void;
