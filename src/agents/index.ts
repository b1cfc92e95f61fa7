/**
 * agents/index.ts — Barrel export for the reasoning layer.
 *
 * `middleware/` holds request-level concerns (fetching, chain guarding).
 * `agents/` holds the modules that decide what a step is and what its
 * answer should be:
 *   • Task Classifier   — evidence-based task-kind tagging
 *   • Answer Engine     — prompt, reasoning call, reply validation
 *   • Reasoning Service — the language-model boundary
 */

export { classify, evidenceFrom } from './taskClassifier';
export type { ClassificationEvidence } from './taskClassifier';

export { AnswerEngine, parseAnswerReply } from './answerEngine';
export type { AnswerContext, AnswerEngineOptions } from './answerEngine';

export { ANSWER_SCHEMA_HINT, buildPrompt } from './prompts';
export type { PromptInput } from './prompts';

export { OpenAIReasoningService } from './reasoningService';
export type { CompleteOptions, ReasoningService } from './reasoningService';
