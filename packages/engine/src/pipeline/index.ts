export { Pipeline, deriveRunId } from './pipeline.js';
