export * from "./interfaces";
export * from "./node";
