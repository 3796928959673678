export * from "./http/http-provider.connector";
export * from "./http/axios-provider.connector";
