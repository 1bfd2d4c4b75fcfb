import { z } from 'zod';
import * as schemas from './protocol/schemas';

export type ProcessDefinition = z.infer<typeof schemas.ProcessDefinitionSchema>;
export type ProcessDefinitionInput = z.input<typeof schemas.ProcessDefinitionSchema>;
export type StageDefinition = z.infer<typeof schemas.StageDefinitionSchema>;
export type ItemSchemaDefinition = z.infer<typeof schemas.ItemSchemaDefinitionSchema>;
export type ActionTemplateDefinition = z.infer<typeof schemas.ActionTemplateSchema>;
export type FieldRulesDefinition = z.infer<typeof schemas.FieldRulesSchema>;

// Re-export schemas for convenience
export * from './protocol/schemas';
