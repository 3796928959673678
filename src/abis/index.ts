export * from "./positionManager";
export * from "./factory";
export * from "./pool";
export * from "./erc20";
