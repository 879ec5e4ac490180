import { isRecord } from '../schema/format.js';

export const DEFAULT_SESSION_ID = 'default';

export interface SessionContext {
    sessionId: string;
}

export type ToolResponse = {
    content: Array<{ type: 'text'; text: string }>;
};

export type ToolHandler = (args: unknown, ctx: SessionContext) => Promise<ToolResponse>;

/**
 * Adapts a handler to the MCP tool callback shape, pulling the optional
 * `sessionId` argument out into the context.
 */
export function withSession(handler: ToolHandler) {
    return async (args: unknown): Promise<ToolResponse> => {
        const sessionId = isRecord(args) && typeof args.sessionId === 'string' && args.sessionId !== ''
            ? args.sessionId
            : DEFAULT_SESSION_ID;
        return handler(args, { sessionId });
    };
}

export function textResponse(text: string): ToolResponse {
    return { content: [{ type: 'text', text }] };
}
