export * from './stagegate';
export { runStagegateCli } from './stagegate/cli';
