export { generateModpack, runGenerate } from "./generate";
export type { GenerateOptions, GenerateResult } from "./generate.types";
