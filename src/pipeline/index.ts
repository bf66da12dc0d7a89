export * from "./scoreContacts";
export * from "./runScoring";
