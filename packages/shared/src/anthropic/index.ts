export {
  createAnthropicClient,
  createAnthropicCompletionService,
  type CompletionOptions,
} from "./completion.js";
