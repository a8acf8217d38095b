import {isErrorResponse} from '../plugins/protocol.js';
import {ServerResult} from '../types.js';

/**
 * Wrap a plugin's JSON response as a tool result, flagging `{error}` responses.
 */
export function toServerResult(response: string): ServerResult {
    const parsed: unknown = JSON.parse(response);
    const result: ServerResult = {
        content: [{type: "text", text: response}],
    };
    if (isErrorResponse(parsed)) {
        result.isError = true;
    }
    return result;
}
