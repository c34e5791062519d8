export {
  parsePromptTemplate,
  parsePrompt,
  renderPrompt,
  listPlaceholders,
  MalformedTemplateError,
  SEPARATOR_PATTERN,
  type PromptSpec,
  type TemplateShape,
  type ParsedTemplate,
} from './template.js';
export { BASELINE_PROMPT, TAXONOMY_HEADER, PROJECT_DIRS } from './templates.js';
export {
  DEFAULT_CONFIG,
  configTemplate,
  type ConfigTemplateAnswers,
} from './config.js';
export { mkdirSafe } from './utils.js';
export {
  validateProject,
  formatValidation,
  hasFailures,
  KNOWN_PLACEHOLDERS,
  type ValidationCheck,
} from './validation.js';
