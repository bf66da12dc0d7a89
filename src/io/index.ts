export * from "./delimited";
