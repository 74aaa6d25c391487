export * from "./csv_reader";
export * from "./boxes";
export * from "./tags";
