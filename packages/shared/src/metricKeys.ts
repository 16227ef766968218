/**
 * Launch monitor export columns, keyed by the typed field they load into.
 */
export const metricKeys = {
  ballSpeedMph: "Ball (mph)",
  clubSpeedMph: "Club (mph)",
  smash: "Smash",
  carryYds: "Carry (yds)",
  totalYds: "Total (yds)",
  rollYds: "Roll (yds)",
  spinRpm: "Spin (rpm)",
  heightFt: "Height (ft)",
  flightTimeS: "Time (s)",
  aoaDeg: "AOA (°)",
  spinLoftDeg: "Spin Loft (°)",
  swingPlaneDeg: "Swing V (°)",
  curveDistYds: "Curve Dist (yds)",
} as const;

export type MetricKey = keyof typeof metricKeys;

/** Candidate order for metric pickers and raw tables */
export const METRIC_KEYS = Object.keys(metricKeys) as MetricKey[];

export function isMetricKey(value: string): value is MetricKey {
  return Object.prototype.hasOwnProperty.call(metricKeys, value);
}

// efficiency ratio: ball speed / club speed
export const EFFICIENCY_METRIC: MetricKey = "smash";

export const DEFAULT_BASIS_METRIC: MetricKey = "carryYds";
