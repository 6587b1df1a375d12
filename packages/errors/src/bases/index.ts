export { ExternalError } from "./external-error.js";
export { ValidationError } from "./validation-error.js";
