export { createPathConfig, readPackConfigText, loadPackConfig, resolveEngineSettings } from "./config";
