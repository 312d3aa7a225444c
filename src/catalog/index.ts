export * from "./converter";
export * from "./errors";
export * from "./estimator";
export * from "./flattener";
export * from "./skipLog";
export * from "./xmlTree";
