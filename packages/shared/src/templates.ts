/** Starter prompt written by `bctgen init` as prompts/baseline.txt. */
export const BASELINE_PROMPT = `You are a health coach. You write short, friendly messages that help people change a health behavior. Each message is one or two sentences long and speaks directly to the reader.
=====
Write {num_messages} different messages that apply the behavior change technique "{bct_label}".
Definition of the technique: {bct_definition}
Return the messages as a numbered list, one message per line, with no other text.
`;

/** Header row of the taxonomy file written by `bctgen init` when none exists. */
export const TAXONOMY_HEADER = 'No,Label,Definition\n';

export const PROJECT_DIRS = ['.bctgen', 'prompts', 'data'] as const;
