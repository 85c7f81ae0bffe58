export { createLlmClient } from "./client";
export { getModel } from "./providers";
export { createTextGenerator } from "./generator";
export type { ProviderEndpoints } from "./providers";
export type { TextGeneratorOptions } from "./generator";
