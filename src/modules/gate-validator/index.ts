export { ContractGate, createContractGate, changedFiles, scopeViolations } from './contract-gate.js'
export type { ContractGateOptions } from './contract-gate.js'
export { DEFAULT_ROLE_CONTRACTS } from './contracts.js'
export type { GateInput, GateResult, GateValidator, GateViolation, RoleContract, ScopeRules } from './types.js'
