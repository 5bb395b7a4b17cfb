export { GeminiClient, getErrorDetail, type GeminiClientConfig } from './client.js';
export {
  createMapPrompt,
  createReducePrompt,
  createAnswerPrompt,
  renderTemplate,
  localeName,
} from './prompts.js';
