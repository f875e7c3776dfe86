export { default as OpenAILLM } from './openai';
