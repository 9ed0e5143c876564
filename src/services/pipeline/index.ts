export { PipelineService, createPipelineService } from './pipeline.service.js';
export * from './types.js';
