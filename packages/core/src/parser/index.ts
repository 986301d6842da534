export { ResponseParser, FINAL_MESSAGE_MARKER, extractPayload } from './response-parser.js';
export {
	type ParseOutcome,
	type ParseOutcomeKind,
	type FinalMessageOutcome,
	type ToolCallsOutcome,
	type InconclusiveOutcome,
} from './types.js';
