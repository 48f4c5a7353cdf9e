export { resolvePack } from "./resolver";
export type { ResolveOptions } from "./resolver.types";
