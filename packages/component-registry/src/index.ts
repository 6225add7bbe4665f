export { ComponentRegistry, sanitizeName } from './registry'
export type {
  ComponentRegistryDeps,
  ComponentStateHandle,
  ComponentSummary,
  RegisterComponentInput,
} from './registry'
