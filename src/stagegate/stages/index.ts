export { Stage, type StageOptions, type StageResult } from './stage';
export { renderTemplate, resolveTemplate, type ActionTemplate, type ActionTemplates } from './actions';
