export * from "./source";
export * from "./page-capture";
export * from "./extracted-record";
export * from "./cleaned-document";
export * from "./analysis-result";
export * from "./aggregated-profile";
export * from "./failure-entry";
