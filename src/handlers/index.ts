export { parseLogicHandler, checkLogicHandler, reasonHandler } from './core.js';
export { ingestKnowledgeBaseHandler } from './llm.js';
export { buildReasonResponse, parseArgs } from './utils.js';
