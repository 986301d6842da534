export { TraceRecorder } from './recorder.js';
export { MemoryTraceSink, JsonFileTraceSink, serializeTrace } from './sink.js';
export {
	type TerminationReason,
	type LoopState,
	type IterationOutcome,
	type IterationRecord,
	type StateTransition,
	type Trace,
	type TraceSink,
} from './types.js';
