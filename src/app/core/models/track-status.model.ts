export interface StatusInterval {
  /** Track status code as published by the timing feed. */
  status: string | number;
  /** Seconds from session start. */
  startTime: number;
  /** `null` while the status is still in force. */
  endTime: number | null;
}

export type TimelineEventKind =
  | 'DROPOUT'
  | 'CAUTION'
  | 'RED_FLAG'
  | 'SAFETY_CAR'
  | 'VIRTUAL_SAFETY_CAR';

export interface TimelineEvent {
  kind: TimelineEventKind;
  frame: number;
  endFrame?: number;
  label: string;
  lap?: number;
}
