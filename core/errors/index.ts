/**
 * Central export point for solconf error types.
 */
export { SolconfError, displayAddress } from './SolconfError';
export type { BaseErrorDetails, NodeLocation, SolconfErrorOptions } from './SolconfError';
export { ErrorCode } from './codes';
export { ConstructionError } from './ConstructionError';
export { AddressError } from './AddressError';
export { CyclicDependencyError } from './CyclicDependencyError';
export { TypeConstraintError } from './TypeConstraintError';
export { RequirementError } from './RequirementError';
export { ChoiceConstraintError } from './ChoiceConstraintError';
export { EvalError } from './EvalError';
export { OverrideConflictError } from './OverrideConflictError';
export { ResolutionError } from './ResolutionError';
export { UnitNotFoundError } from './UnitNotFoundError';
