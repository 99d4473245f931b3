export * from "./artifacts";
export * from "./jobTime";
export * from "./labels";
export * from "./table";
export * from "./targets";
