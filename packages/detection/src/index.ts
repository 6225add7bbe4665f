/**
 * @gridwarden/detection — Public API
 */

export * from './types'
export { DEFAULT_RULE_BOUNDS, buildDefaultRules } from './default-rules'
export { RuleDetector, describeBreach, isFiniteNumber } from './rule-detector'
export { BaselineStore } from './baseline-store'
export type { MetricBaseline } from './baseline-store'
export { DEFAULT_DEVIATION_SETTINGS, DeviationDetector } from './deviation-detector'
export { DetectionEngine, createDetectionEngine, highestSeverity } from './detection-engine'
export { SecurityEventSink, coalesceFindings } from './event-sink'
export type { ActionInput, CoalescedGroup, RecordOptions } from './event-sink'
export { ATTACK_SCENARIOS, findScenario, scenarioTags } from './attack-scenarios'
export type { AttackScenario, ScenarioContext } from './attack-scenarios'
export { AttackSimulator } from './attack-simulator'
export type { SimulationRequest, SimulationResult, SimulatorOptions } from './attack-simulator'
export { TelemetryService, checkPayload } from './telemetry-service'
export type { IngestRequest, IngestResult, PayloadCheck, TelemetryServiceDeps } from './telemetry-service'
