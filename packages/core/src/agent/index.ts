export { OrchestrationLoop, resolveSettings } from './loop.js';
export { InstructionBuilder, interpolate, type InstructionBuilderOptions } from './instructions.js';
export {
	DEFAULT_LOOP_SETTINGS,
	type LoopSettings,
	type IterationEvent,
	type OrchestrationLoopOptions,
	type RunOptions,
	type RunResult,
} from './types.js';
