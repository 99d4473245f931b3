export * from "./classify";
export * from "./executor";
export * from "./retryMachine";
