export * from "./types/index";
export * from "./constants/index";
export * from "./schemas/index";
