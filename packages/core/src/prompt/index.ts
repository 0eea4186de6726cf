export { ReadlineConfirmPrompt, parseConfirmAnswer } from './confirm_prompt';
export type { ConfirmPrompt, ReadlineConfirmPromptOptions } from './confirm_prompt';
