import type { Deliverables, Phase, PhaseId } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Phase Table
// One phase = one agent conversation = one required deliverable.
// ═══════════════════════════════════════════════════════════════════════════════

export const PHASE_ORDER: readonly PhaseId[] = ['prd', 'architecture', 'tasks', 'implementation', 'review', 'tests'];

const PRD_PROMPT = `You are a Project Manager. Write a detailed Product Requirements Document for the given project.
Call write_file ONCE with path='{{deliverable}}' containing a thorough PRD. Then stop.`;

const ARCHITECTURE_PROMPT = `You are a Project Manager and System Architect.
First, call read_file with path='{{prd}}' to read the requirements.
Then call write_file ONCE with path='{{deliverable}}'.

The document must describe:
1. Technology stack choices
2. Folder layout:
   - src/      : main source code files (list each file with its purpose)
   - tests/    : unit test files
   - frontend/ : HTML/CSS/JS files (if applicable)
   - logs/     : runtime log files
3. Every source file explicitly, one per line with its purpose.`;

const TASKS_PROMPT = `You are a Team Lead. Break the project into development tasks.
First, call read_file with path='{{prd}}'.
Then, call read_file with path='{{architecture}}'.
Then, call write_file ONCE with path='{{deliverable}}'.

The JSON must be an array of task objects, each with: id, name, description, files.
The 'files' key must list REAL source file paths that match {{architecture}}.

Critical rules:
- Do NOT use names like 'file1.txt'.
- Use paths from the architecture (src/, frontend/, tests/).
- Stop after writing {{deliverable}}.`;

const IMPLEMENTATION_PROMPT = `You are a senior Developer. Implement ALL project source files listed in {{tasks}}.

Steps:
1. Call read_file with path='{{architecture}}'
2. Call read_file with path='{{tasks}}'
3. For EVERY file in the 'files' array of every task, call write_file with COMPLETE working code.
   - Use the exact path from the task list; source files live under '{{deliverable}}/'.
   - Write REAL runnable code: no placeholders, no pseudocode.
   - Include all imports and a working entry point.

Write every file. Stop only after ALL files are written.`;

const REVIEW_PROMPT = `You are a Code Reviewer. Validate the generated source files.
1. Call read_file with path='{{tasks}}' to get the file list.
2. Call read_file for each source file.
3. Call write_file ONCE with path='{{deliverable}}': a real report with CRITICAL/ADVISORY/NITPICK findings.
Stop after writing the report.`;

const TESTS_PROMPT = `You are a QA Engineer. Write unit tests for the project.
1. Call read_file with path='{{tasks}}' to get the file list.
2. Call read_file for each source file (once each).
3. Call write_file ONCE with path='{{deliverable}}'.
   - Include happy path, edge case, and error condition tests.
Stop immediately after writing. Do NOT re-read or rewrite the test file.`;

export function buildPhases(deliverables: Deliverables): Phase[] {
    return [
        {
            id: 'prd',
            label: 'Project Manager',
            systemPrompt: PRD_PROMPT,
            instruction: 'Write a PRD for this project: {{requirement}}',
            deliverable: deliverables.prd,
            consumes: [],
            tools: ['write_file', 'read_file'],
        },
        {
            id: 'architecture',
            label: 'Architect',
            systemPrompt: ARCHITECTURE_PROMPT,
            instruction: 'Read {{prd}}, then write {{deliverable}} with the folder layout and file list.',
            deliverable: deliverables.architecture,
            consumes: ['prd'],
            tools: ['write_file', 'read_file'],
        },
        {
            id: 'tasks',
            label: 'Team Lead',
            systemPrompt: TASKS_PROMPT,
            instruction: 'Read {{inputs}}, then write {{deliverable}}.',
            deliverable: deliverables.tasks,
            consumes: ['prd', 'architecture'],
            tools: ['write_file', 'read_file'],
        },
        {
            id: 'implementation',
            label: 'Developer',
            systemPrompt: IMPLEMENTATION_PROMPT,
            instruction: 'Read {{inputs}}. Implement every source file listed.',
            deliverable: deliverables.implementation,
            consumes: ['architecture', 'tasks'],
            tools: ['write_file', 'read_file', 'list_dir'],
        },
        {
            id: 'review',
            label: 'Backend Logic Validator',
            systemPrompt: REVIEW_PROMPT,
            instruction: 'Read {{tasks}}, read each source file, write {{deliverable}}.',
            deliverable: deliverables.review,
            consumes: ['tasks', 'implementation'],
            tools: ['write_file', 'read_file'],
        },
        {
            id: 'tests',
            label: 'QA Tester',
            systemPrompt: TESTS_PROMPT,
            instruction: 'Read {{tasks}}, read each source file once, write {{deliverable}}.',
            deliverable: deliverables.tests,
            consumes: ['tasks', 'implementation'],
            tools: ['write_file', 'read_file'],
        },
    ];
}

// ─── Template Rendering ──────────────────────────────────────────────────────

export interface TemplateContext {
    requirement: string;
    deliverable: string;
    /** Deliverable names of the phases this one consumes, keyed by phase id. */
    inputs: Partial<Record<PhaseId, string>>;
}

/**
 * Fill `{{requirement}}`, `{{deliverable}}`, `{{inputs}}` and `{{<phaseId>}}`
 * placeholders. A placeholder for a phase the template does not consume is a
 * bug in the phase table and throws.
 */
export function renderTemplate(template: string, ctx: TemplateContext): string {
    return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
        if (key === 'requirement') return ctx.requirement;
        if (key === 'deliverable') return ctx.deliverable;
        if (key === 'inputs') return Object.values(ctx.inputs).join(' and ');
        const input = isPhaseId(key) ? ctx.inputs[key] : undefined;
        if (input === undefined) {
            throw new Error(`Template placeholder ${match} has no value`);
        }
        return input;
    });
}

function isPhaseId(value: string): value is PhaseId {
    return PHASE_ORDER.some((id) => id === value);
}
