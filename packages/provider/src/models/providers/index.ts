export { ANTHROPIC_MODELS } from "./anthropic.js";
export { OPENAI_MODELS } from "./openai.js";
export { OPENROUTER_DEFAULTS, OPENROUTER_MODELS } from "./openrouter.js";
