export * from "./access.types";
export { AccessReconciler, isSufficientRole, roleRank } from "./access";
