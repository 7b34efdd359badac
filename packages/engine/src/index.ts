export * from "./rng";
export * from "./errors";
export * from "./weighted";
export * from "./template";
export * from "./attributes";
export * from "./item";
export * from "./naming";
export * from "./identity";
export * from "./generator";
export * from "./weapon";
export * from "./scroll";
