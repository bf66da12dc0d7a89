export * from "./loader";
export * from "./fileSource";
