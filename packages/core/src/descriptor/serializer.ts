import { stringify } from 'yaml';
import { z } from 'zod';
import { OutputSchema, ProcessorSchema, TriggerSchema } from '../templates/schema.js';
import type {
  OutputRecord,
  ProcessorRecord,
  ProjectTemplate,
  TriggerRecord,
} from '../templates/schema.js';

export const DESCRIPTOR_FILENAME = 'pipeline.yaml';
export const DESCRIPTOR_VERSION = '1.0.0';

/**
 * Runtime settings written into every descriptor. Not derived from the template.
 */
export const PIPELINE_SETTINGS = {
  performance: {
    max_concurrent: 10,
    buffer_size: 1000,
  },
  monitoring: {
    enabled: true,
    log_level: 'INFO',
  },
  security: {
    require_auth: false,
    rate_limit: 1000,
  },
} as const;

export interface PipelineDescriptor {
  name: string;
  version: string;
  description: string;
  triggers: TriggerRecord[];
  processors: ProcessorRecord[];
  outputs: OutputRecord[];
  settings: typeof PIPELINE_SETTINGS;
}

/**
 * Shape the external runtime expects when it reads pipeline.yaml
 */
export const PipelineDescriptorSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  description: z.string().optional(),
  triggers: z.array(TriggerSchema),
  processors: z.array(ProcessorSchema),
  outputs: z.array(OutputSchema),
  settings: z.record(z.unknown()),
});

/**
 * Assemble the descriptor object. Top-level keys are inserted in document order.
 */
export function buildPipelineDescriptor(
  template: ProjectTemplate,
  projectName: string
): PipelineDescriptor {
  return {
    name: projectName,
    version: DESCRIPTOR_VERSION,
    description: template.description,
    triggers: template.triggers,
    processors: template.processors,
    outputs: template.outputs,
    settings: PIPELINE_SETTINGS,
  };
}

/**
 * Render pipeline.yaml. Same template and name always give the same text.
 */
export function serializePipeline(template: ProjectTemplate, projectName: string): string {
  return stringify(buildPipelineDescriptor(template, projectName), {
    indent: 2,
    lineWidth: 0,
    aliasDuplicateObjects: false,
  });
}
