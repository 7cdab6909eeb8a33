export { allTemplates, agenticTemplates, mcpTemplates, workloadTag } from './catalog.js';
export type { PromptParams, PromptTemplate, WorkloadFamily } from './catalog.js';
export {
  createPrompt,
  defaultCatalog,
  estimateTokens,
  paddedPromptProvider,
  selectTemplate,
  targetTokensFor,
} from './prompt.js';
export type { PromptProvider, WorkloadCatalog } from './prompt.js';

