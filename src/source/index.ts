export * from "./source.types";
export { parseSourceLocation, getSourceDisplayName } from "./sources";
export { GitRepositoryFetcher } from "./fetcher";
export { checkoutSource, describeCheckout, type CheckoutDeps } from "./checkout";
