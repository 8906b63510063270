export * from "./core/version";
export * from "./core/bump";
export * from "./core/git";
export * from "./core/tags";
export * from "./core/version-store";
export * from "./core/release-calc";
export * from "./core/changelog";
export * from "./core/content-update";
export * from "./core/port-wait";
export * from "./core/atomic-write";
export * from "./config";
export * from "./types/errors";
