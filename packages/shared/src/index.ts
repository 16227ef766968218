export * from "./metricKeys";
export * from "./domain/shot";
export * from "./domain/stats";
export * from "./domain/round";
export * from "./domain/report";
