// @coretag/assignment-kernel
// Entry point exports for the tag-to-box assignment core.

export * from "./kernel";
export * from "./records/errors";
export * from "./records/depth";
export * from "./records/tag";
export * from "./records/box";
export * from "./ordering/natural_key";
export * from "./ordering/compare";
export * from "./boundary/resolver";
