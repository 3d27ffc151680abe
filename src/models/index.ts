export * from "./Logger";
export * from "./LogPrinter";
export * from "./Env";
export * from "./Serializer";
export * from "./OutputAssembler";
