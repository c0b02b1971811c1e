export * from "./image";
export * from "./statistics";
export * from "./telegram";
