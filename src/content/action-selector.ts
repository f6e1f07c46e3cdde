import type { ActionMode, RunConfig } from "../config/config.js";
import type { RandomSource } from "./random.js";
import type { ActionType, StrategyKind } from "./types.js";

export const REPLY_PROBABILITY = 0.4;

const POST_STRATEGIES: Record<Exclude<ActionMode, "reply_only">, StrategyKind> = {
	strategic_mix: "trend",
	post_only_controversy: "trend",
	post_only_news: "news",
	post_only_word: "document",
};

const POST_STRATEGY_BY_MODE = new Map<string, StrategyKind>(Object.entries(POST_STRATEGIES));

/**
 * Decide between posting and replying. `strategic_mix` draws once from the
 * random source; every other mode is fixed.
 */
export function selectAction(mode: string, random: RandomSource): ActionType {
	if (mode === "reply_only") return "reply";
	if (mode === "strategic_mix") return random() < REPLY_PROBABILITY ? "reply" : "post";
	return "post";
}

/**
 * Strategy used for a post. `autoNiche` always follows trends; unknown modes
 * have no strategy.
 */
export function resolvePostStrategy(
	run: Pick<RunConfig, "actionMode" | "autoNiche">,
): StrategyKind | null {
	if (run.autoNiche) return "trend";
	return POST_STRATEGY_BY_MODE.get(run.actionMode) ?? null;
}
