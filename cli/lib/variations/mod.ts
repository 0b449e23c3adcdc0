/**
 * Variation strategy registry.
 *
 * Maps strategy names to their implementations. Adding a strategy means
 * adding an entry here; no existing strategy changes.
 *
 * @module
 */

import type { TargetDescriptor } from "../../harness/types.ts";
import type { VariationRecord } from "../schema.ts";
import { decrement, halving, values } from "./numeric.ts";
import { single } from "./single.ts";
import { slotProbe } from "./slot-probe.ts";
import type {
  RegisteredStrategy,
  VariationPlan,
  VariationStrategy,
} from "./types.ts";

/**
 * Erase a strategy's parameter type behind schema validation.
 */
export function defineStrategy<P>(strategy: VariationStrategy<P>): RegisteredStrategy {
  return {
    name: strategy.name,
    generate(target: TargetDescriptor, params: unknown): VariationRecord[] {
      return strategy.generate(target, strategy.schema.parse(params ?? {}));
    },
  };
}

/**
 * All registered strategies.
 */
export const strategies: Record<string, RegisteredStrategy> = {
  single: defineStrategy(single),
  halving: defineStrategy(halving),
  decrement: defineStrategy(decrement),
  values: defineStrategy(values),
  "slot-probe": defineStrategy(slotProbe),
};

/**
 * Get a strategy by name.
 */
export function getStrategy(name: string): RegisteredStrategy | undefined {
  return Object.hasOwn(strategies, name) ? strategies[name] : undefined;
}

/**
 * List all available strategy names.
 */
export function listStrategies(): string[] {
  return Object.keys(strategies);
}

/**
 * Expand a case's plans into records, in plan order.
 * @throws Error for an unknown strategy, ZodError for bad parameters
 */
export function generateVariations(
  target: TargetDescriptor,
  plans: readonly VariationPlan[],
): VariationRecord[] {
  return plans.flatMap((plan) => {
    const strategy = getStrategy(plan.strategy);
    if (!strategy) {
      throw new Error(
        `Unknown variation strategy "${plan.strategy}" (available: ${listStrategies().join(", ")})`,
      );
    }
    return strategy.generate(target, plan.parameters);
  });
}
