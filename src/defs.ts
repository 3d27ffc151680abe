export * from "./types/symbols";
export * from "./types/error";
export * from "./types/field";
export * from "./types/serializer";
