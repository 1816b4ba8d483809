import { createToolRegistry, ToolRegistry } from './registry';
import { createFraudTools, FRAUD_TOOL_NAMES } from './fraud';
import { createAmlTools, AML_TOOL_NAMES } from './aml';
import type { FixtureStore } from './store';
import { Case, Toolkit, toolkitFor } from '../investigator/case';

export interface ToolkitOptions {
  ctrThreshold?: number;
  toolTimeoutMs?: number;
}

export function createToolkitRegistry(toolkit: Toolkit, store: FixtureStore, options: ToolkitOptions = {}): ToolRegistry {
  if (toolkit === 'fraud') {
    return createToolRegistry(createFraudTools(store), {
      requiredTools: FRAUD_TOOL_NAMES,
      defaultTimeoutMs: options.toolTimeoutMs,
    });
  }
  return createToolRegistry(createAmlTools(store, { ctrThreshold: options.ctrThreshold }), {
    requiredTools: AML_TOOL_NAMES,
    defaultTimeoutMs: options.toolTimeoutMs,
  });
}

/** Both registries are built (and validated) up front; the case category picks one. */
export function createToolkitResolver(store: FixtureStore, options: ToolkitOptions = {}): (investigationCase: Case) => ToolRegistry {
  const registries: Record<Toolkit, ToolRegistry> = {
    fraud: createToolkitRegistry('fraud', store, options),
    aml: createToolkitRegistry('aml', store, options),
  };
  return (investigationCase) => registries[toolkitFor(investigationCase.category)];
}
