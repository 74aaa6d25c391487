export * from "./command_runner";
export * from "./latex_compiler";
export * from "./printer";
