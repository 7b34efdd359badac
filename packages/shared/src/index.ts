export * from "./schemas/raw";
export * from "./schemas/records";
export * from "./schemas/tables";
