export * from "./jobHeaders";
export * from "./syncDiff";
