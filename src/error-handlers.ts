import {ServerResult} from './types.js';
import {logToStderr} from './utils/logger.js';

/**
 * Build an error result for a tool call.
 */
export function createErrorResponse(message: string): ServerResult {
    logToStderr('debug', `Tool error: ${message}`);
    return {
        content: [{type: "text", text: `Error: ${message}`}],
        isError: true,
    };
}
