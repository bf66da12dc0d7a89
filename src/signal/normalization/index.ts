export * from "./scoreNormalizer";
