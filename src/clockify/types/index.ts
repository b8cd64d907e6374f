export * from "./api";
export * from "./cli";
export * from "./config";
