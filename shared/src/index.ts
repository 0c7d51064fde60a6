export * from "./types";
export * from "./textUtils";
