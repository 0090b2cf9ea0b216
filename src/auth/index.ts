export * from "./auth.types";
export { CredentialProvider } from "./credential-provider";
