import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

// Get current directory in ESM
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const promptCache = new Map<string, string>();

export type PromptName =
    | 'demand_classifier'
    | 'intent_extractor'
    | 'strategic_planner'
    | 'roadmap_generator';

const PROMPTS = new Set<PromptName>([
    'demand_classifier',
    'intent_extractor',
    'strategic_planner',
    'roadmap_generator',
]);

// Sources run from src/core; the compiled build runs from dist/src/core and
// reads the markdown from the source tree.
const PROMPT_ROOTS = [
    path.resolve(__dirname, '../agent/prompts'),
    path.resolve(__dirname, '../../../src/agent/prompts'),
];

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readPromptFile(promptName: PromptName): Promise<string> {
    for (const root of PROMPT_ROOTS) {
        const promptPath = path.join(root, `${promptName}.md`);
        try {
            const content = await fs.readFile(promptPath, 'utf8');
            if (!content.trim()) {
                throw new Error(`Prompt is empty: ${promptName} (${promptPath})`);
            }
            return content;
        } catch (error) {
            if (isMissingFile(error)) continue;
            throw error;
        }
    }
    throw new Error(`Prompt not found: ${promptName} (searched under ${PROMPT_ROOTS.join(', ')})`);
}

export async function loadPrompt(name: PromptName): Promise<string> {
    if (!PROMPTS.has(name)) {
        throw new Error(`Unknown prompt: ${name}`);
    }
    const cached = promptCache.get(name);
    if (cached !== undefined) return cached;

    const content = await readPromptFile(name);
    promptCache.set(name, content);
    return content;
}

/** Replaces every `{{TOKEN}}` with its value; objects are pretty-printed JSON. */
export function renderPrompt(template: string, replacements: Record<string, unknown>): string {
    let rendered = template;
    for (const [token, value] of Object.entries(replacements)) {
        const text = value === undefined || value === null
            ? ''
            : typeof value === 'string' ? value : JSON.stringify(value, null, 2);
        rendered = rendered.replaceAll(`{{${token}}}`, text);
    }
    return rendered;
}

export function clearPromptCache() {
    promptCache.clear();
}
