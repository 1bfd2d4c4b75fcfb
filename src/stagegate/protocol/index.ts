export { ProcessLoader, formatFromPath, type DefinitionFormat } from './loader';
export { buildProcess, type BuildOptions } from './builder';
