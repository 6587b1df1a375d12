export { AllowListPolicy } from "./allow-list.js";
export { extractScheme, normalizeUrl } from "./protocols.js";
