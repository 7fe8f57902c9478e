export {DECISIONS, parseDecision, type Decision} from './decision';
export {
	runInteractionLoop,
	type InteractionLoopOptions,
} from './interactionLoop';
