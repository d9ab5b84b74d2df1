export { classifyPipelineError } from './error-classifier';
