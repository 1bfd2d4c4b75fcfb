export {
  Gate,
  LEGACY_OPERATORS,
  type ComponentResult,
  type GateComponent,
  type GateOperator,
  type GateOptions,
  type GateResult,
  type StructureThresholds,
} from './gate';
