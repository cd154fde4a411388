import { afterEach, describe, it, expect } from 'vitest';
import { clearPromptCache, loadPrompt, PromptName, renderPrompt } from '../../src/core/prompts.js';

describe('Prompts', () => {
    afterEach(() => clearPromptCache());

    it('should load every prompt with its role line', async () => {
        const roles: Array<[PromptName, string]> = [
            ['demand_classifier', 'You are the Demand Classifier'],
            ['intent_extractor', 'You are the Intent Extractor'],
            ['strategic_planner', 'You are the Strategic Planner'],
            ['roadmap_generator', 'You are the Roadmap Generator'],
        ];

        for (const [name, role] of roles) {
            const content = await loadPrompt(name);
            expect(content).toContain(role);
        }
    });

    it('classifier prompt carries its placeholders', async () => {
        const content = await loadPrompt('demand_classifier');
        expect(content).toContain('{{USER_INPUT}}');
        expect(content).toContain('{{DOMAIN}}');
        expect(content).toContain('{{ROUND}}');
    });

    it('renders every occurrence and pretty-prints objects', () => {
        const rendered = renderPrompt('{{A}} and {{A}}; {{B}}; {{C}}', {
            A: 'x',
            B: { k: 1 },
            C: null,
        });
        expect(rendered).toBe('x and x; {\n  "k": 1\n}; ');
    });
});
