export * from "./item-types";
