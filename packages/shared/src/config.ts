export interface ConfigTemplateAnswers {
  model?: string;
  defaultCount?: number;
  taxonomyPath?: string;
}

export const DEFAULT_CONFIG = {
  paths: {
    prompts: 'prompts',
    data: 'data',
    taxonomy: 'taxonomy.csv',
  },
  generation: {
    model: 'sonnet',
    max_turns: 1,
    default_count: 10,
  },
};

export function configTemplate(answers: ConfigTemplateAnswers = {}): string {
  return JSON.stringify({
    paths: {
      ...DEFAULT_CONFIG.paths,
      taxonomy: answers.taxonomyPath || DEFAULT_CONFIG.paths.taxonomy,
    },
    generation: {
      ...DEFAULT_CONFIG.generation,
      model: answers.model || DEFAULT_CONFIG.generation.model,
      default_count: answers.defaultCount ?? DEFAULT_CONFIG.generation.default_count,
    },
  }, null, 2);
}
