/**
 * Configuration: exporter settings and job definitions.
 */

export {
  ExporterConfig,
  ExporterConfigBuilder,
  type ExporterConfigOptions,
} from './exporter-config';
export { defineJob, type JobDefinition } from './job-definition';
export {
  parseJobFile,
  loadJobFile,
  loadJobs,
  buildCommand,
  jobFileSchema,
  scriptEntrySchema,
  type JobLoaderOptions,
  type ScriptEntry,
} from './job-loader';
