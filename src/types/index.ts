export type * from "./openai.js";
export type * from "./backend.js";
export type * from "./generation.js";
