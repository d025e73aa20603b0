import type { ToolDefinition, ToolInvocation, ToolName, ToolResult } from './types.js';
import { listDir, readFile, writeFile } from './sandbox.js';

// ─── Tool Schema (OpenAI function format) ────────────────────────────────────

const TOOL_DEFINITIONS: Record<ToolName, ToolDefinition> = {
    write_file: {
        type: 'function',
        function: {
            name: 'write_file',
            description: 'Write content to a file at the given path.',
            parameters: {
                type: 'object',
                properties: {
                    path: { type: 'string', description: 'Relative file path to write to.' },
                    content: { type: 'string', description: 'Content to write into the file.' },
                },
                required: ['path', 'content'],
            },
        },
    },
    read_file: {
        type: 'function',
        function: {
            name: 'read_file',
            description: 'Read the content of a file at the given path.',
            parameters: {
                type: 'object',
                properties: {
                    path: { type: 'string', description: 'Relative file path to read from.' },
                },
                required: ['path'],
            },
        },
    },
    list_dir: {
        type: 'function',
        function: {
            name: 'list_dir',
            description: 'List the entries of a directory at the given path.',
            parameters: {
                type: 'object',
                properties: {
                    path: { type: 'string', description: 'Relative directory path to list.' },
                },
                required: ['path'],
            },
        },
    },
};

/** The two tools every phase gets. */
export const DEFAULT_TOOLS: readonly ToolName[] = ['write_file', 'read_file'];

export function getToolSchema(tools: readonly ToolName[] = DEFAULT_TOOLS): ToolDefinition[] {
    return tools.map((name) => TOOL_DEFINITIONS[name]);
}

function isToolName(name: string): name is ToolName {
    return Object.prototype.hasOwnProperty.call(TOOL_DEFINITIONS, name);
}

// ─── Argument Decoding ───────────────────────────────────────────────────────

export const UNPARSABLE_ARGUMENTS_RESULT = 'Error: Could not parse tool arguments. Please retry with valid JSON.';

/** Returns null when the argument string is not a JSON object. */
export function parseToolArguments(raw: string): Record<string, unknown> | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return null;
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        return null;
    }
    return Object.fromEntries(Object.entries(parsed));
}

function stringArg(args: Record<string, unknown>, key: string): string | null {
    const value = args[key];
    return typeof value === 'string' ? value : null;
}

/**
 * Turn a name plus loose arguments into one of the closed set of tool
 * invocations, or a rejection result to hand back to the model.
 */
export function decodeToolCall(
    name: string,
    args: Record<string, unknown>,
    enabled: readonly ToolName[] = DEFAULT_TOOLS
): ToolInvocation | ToolResult {
    if (!isToolName(name) || !enabled.includes(name)) {
        return { kind: 'unsupported', name, text: `Error: Unsupported tool: ${name}` };
    }

    const filePath = stringArg(args, 'path');
    if (filePath === null) {
        return { kind: 'invalid-arguments', name, text: `Error: ${name} requires a string "path" argument.` };
    }

    switch (name) {
        case 'write_file': {
            const content = stringArg(args, 'content');
            if (content === null) {
                return { kind: 'invalid-arguments', name, text: 'Error: write_file requires a string "content" argument.' };
            }
            return { kind: 'write_file', path: filePath, content };
        }
        case 'read_file':
            return { kind: 'read_file', path: filePath };
        case 'list_dir':
            return { kind: 'list_dir', path: filePath };
    }
}

// ─── Dispatch ────────────────────────────────────────────────────────────────

export function executeTool(invocation: ToolInvocation, projectRoot: string): ToolResult {
    switch (invocation.kind) {
        case 'write_file':
            return { kind: 'ok', text: writeFile(projectRoot, invocation.path, invocation.content) };
        case 'read_file':
            return { kind: 'ok', text: readFile(projectRoot, invocation.path) };
        case 'list_dir':
            return { kind: 'ok', text: listDir(projectRoot, invocation.path) };
    }
}

export function dispatchTool(
    name: string,
    args: Record<string, unknown>,
    projectRoot: string,
    enabled: readonly ToolName[] = DEFAULT_TOOLS
): ToolResult {
    const decoded = decodeToolCall(name, args, enabled);
    switch (decoded.kind) {
        case 'ok':
        case 'unsupported':
        case 'invalid-arguments':
            return decoded;
        default:
            return executeTool(decoded, projectRoot);
    }
}
