export * from "./leadScore";
