import { ConfigurationError } from "../errors.js";
import * as engulfing from "./engulfing.js";
import * as srBreakout from "./sr_breakout.js";
import * as threeBear from "./three_bear.js";
import type { Strategy, StrategyModule, StrategyTarget } from "./types.js";

/** Reserved selection that expands to every registered strategy. */
export const ALL_STRATEGIES = "all" as const;

export type StrategySelection = ReadonlyArray<string> | typeof ALL_STRATEGIES;

export interface StrategyRegistry {
  /** Registered names in registration order. */
  names(): string[];
  has(name: string): boolean;
  describe(name: string): string;
  /**
   * Expands "all", drops repeats and rejects unknown names.
   * @throws ConfigurationError
   */
  resolve(selection: StrategySelection): string[];
  /** @throws ConfigurationError for unknown names or invalid params. */
  create(name: string, target: StrategyTarget, params?: Record<string, unknown>): Strategy;
}

export const createStrategyRegistry = (
  modules: ReadonlyArray<StrategyModule>,
): StrategyRegistry => {
  const table = new Map<string, StrategyModule>();
  for (const module of modules) {
    if (module.name === ALL_STRATEGIES) {
      throw new ConfigurationError(`"${ALL_STRATEGIES}" is reserved and cannot name a strategy`);
    }
    if (table.has(module.name)) {
      throw new ConfigurationError(`Strategy "${module.name}" registered twice`);
    }
    table.set(module.name, module);
  }

  const lookup = (name: string): StrategyModule => {
    const module = table.get(name);
    if (!module) {
      const known = Array.from(table.keys()).join(", ");
      throw new ConfigurationError(`Unknown strategy "${name}". Registered: ${known}`);
    }
    return module;
  };

  return {
    names: () => Array.from(table.keys()),
    has: (name) => table.has(name),
    describe: (name) => lookup(name).description,
    resolve(selection) {
      const requested = selection === ALL_STRATEGIES ? [ALL_STRATEGIES] : selection;
      if (requested.length === 0) {
        throw new ConfigurationError("No strategies selected");
      }
      const resolved: string[] = [];
      for (const raw of requested) {
        const name = raw.trim();
        const expanded = name === ALL_STRATEGIES ? Array.from(table.keys()) : [lookup(name).name];
        for (const item of expanded) {
          if (!resolved.includes(item)) {
            resolved.push(item);
          }
        }
      }
      return resolved;
    },
    create(name, target, params = {}) {
      const module = lookup(name);
      const parsed = module.schema.safeParse(params);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => issue.message).join("; ");
        throw new ConfigurationError(`Invalid params for strategy "${name}": ${issues}`);
      }
      return module.factory(target, parsed.data);
    },
  };
};

/** Built-in strategies, in the order "all" expands to. */
export const defaultRegistry = (): StrategyRegistry =>
  createStrategyRegistry([engulfing, srBreakout, threeBear]);
