export interface AxisRange {
  min: number;
  max: number;
}

export type ChartDisplayMode = 'single' | 'multi';

/** Independent copy of one channel's buffer */
export interface SeriesSnapshot {
  values: number[];
  timestamps: number[]; // ms since session (or last rate change) start
}
