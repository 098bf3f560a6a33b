export * from "./platform";
export * from "./archive";
export * from "./buildsystem";
export * from "./checksum";
export * from "./manifest";
export * from "./release";
export * from "./issues";
