// Type exports

export * from "./provisioning-config";
export * from "./provisioning-result";
export * from "./connection";
