#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig } from './core/config.js';
import { console_log } from './core/console.js';
import { MiningValidationError } from './core/errors.js';
import { errorMessage } from './core/logger.js';
import { createMiningService } from './index.js';
import { MiningResult } from './agent/result.js';
import { FeedbackPayloadInput, FeedbackType, ServiceStatus } from './agent/state.js';

type GlobalOptions = {
    root?: string;
    mock?: boolean;
    json?: boolean;
};

interface MineOptions {
    domain?: string;
    session?: string;
    user?: string;
}

interface ResumeOptions {
    type?: string;
    confirm?: boolean;
    reject?: boolean;
    response: string[];
    adjust?: string;
}

const RESUME_HINTS: Record<FeedbackType, string> = {
    CLARIFICATION: '--response "<answer>" (repeat for each question)',
    SIMPLE_STRATEGY_CONFIRMATION: '--confirm, or --reject --adjust "<changes>"',
    META_ARCHITECT_CONFIRMATION: '--confirm, or --reject --adjust "<changes>"',
};

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

function lastAssistantMessage(result: MiningResult): string | null {
    for (let i = result.messages.length - 1; i >= 0; i--) {
        const message = result.messages[i];
        if (message.role === 'assistant') return message.content;
    }
    return null;
}

function printResult(result: MiningResult, asJson: boolean): void {
    if (asJson) {
        console.log(JSON.stringify(result, null, 2));
        return;
    }

    console_log.divider();
    console_log.info('Session:', result.sessionId);
    console_log.info('Demand state:', result.demandState);

    if (result.status === ServiceStatus.WAITING_FOR_USER_FEEDBACK && result.feedbackType) {
        const prompt = lastAssistantMessage(result);
        if (prompt) {
            console_log.section('Needs your input');
            for (const line of prompt.split('\n')) console_log.question(line);
        }
        console.log(chalk.gray(`\n  Continue with: miner resume ${result.sessionId} ${RESUME_HINTS[result.feedbackType]}\n`));
        return;
    }

    console_log.section('Final requirements');
    for (const requirement of result.finalRequirements) console_log.dim(`- ${requirement}`);

    const roadmap = result.metaArchitectResult?.roadmap;
    if (roadmap) {
        console_log.section(`Roadmap (${roadmap.estimatedDuration})`);
        for (const step of roadmap.steps) console_log.dim(`${step.order}. ${step.title}`);
    }
    console_log.success(`Completed in ${result.processingTimeMs}ms`);
}

function toFeedback(options: ResumeOptions): FeedbackPayloadInput | undefined {
    const hasInput = options.type !== undefined
        || options.confirm
        || options.reject
        || options.response.length > 0
        || options.adjust !== undefined;
    if (!hasInput) return undefined;

    if (options.confirm && options.reject) {
        throw new MiningValidationError('Use either --confirm or --reject, not both');
    }

    return {
        type: options.type?.trim().toUpperCase(),
        confirmation: options.confirm === true,
        responses: options.response,
        adjustments: options.adjust ?? '',
    };
}

function reportFailure(error: unknown): void {
    console_log.error(errorMessage(error));
    if (error instanceof MiningValidationError) {
        for (const issue of error.issues) console_log.dim(issue);
    }
    process.exitCode = 1;
}

const program = new Command();

program
    .name('miner')
    .description('Turn free-form requests into validated task specifications')
    .version('0.1.0')
    .option('--root <path>', 'Project root directory (checkpoints live under it)')
    .option('--mock', 'Use deterministic offline model responses', false)
    .option('--json', 'Print the full result as JSON', false);

program
    .command('mine')
    .description('Start a mining session for a request')
    .argument('<request...>', 'The request, in plain words')
    .option('--domain <domain>', 'Domain hint, e.g. finance')
    .option('--session <id>', 'Session id to use instead of a generated one')
    .option('--user <id>', 'User id recorded in the context')
    .action(async (words: string[], options: MineOptions) => {
        const globals = program.opts<GlobalOptions>();
        try {
            const service = createMiningService(loadConfig());
            const result = await service.mineRequirements(words.join(' '), {
                domain: options.domain,
                sessionId: options.session,
                userId: options.user,
            });
            printResult(result, globals.json === true);
        } catch (error) {
            reportFailure(error);
        }
    });

program
    .command('resume')
    .description('Answer a paused session and continue it')
    .argument('<sessionId>', 'Session id printed by a previous run')
    .option('--type <type>', 'Feedback type (defaults to the one the session is waiting for; unknown types finalize the session)')
    .option('--confirm', 'Accept the proposed plan')
    .option('--reject', 'Reject the proposed plan')
    .option('--response <text>', 'Answer to a clarification question (repeatable)', collect, [])
    .option('--adjust <text>', 'Changes to apply when rejecting')
    .action(async (sessionId: string, options: ResumeOptions) => {
        const globals = program.opts<GlobalOptions>();
        try {
            const service = createMiningService(loadConfig());
            const result = await service.resumeWorkflow(sessionId, toFeedback(options));
            printResult(result, globals.json === true);
        } catch (error) {
            reportFailure(error);
        }
    });

program
    .command('health')
    .description('Check that the checkpoint store is reachable')
    .action(async () => {
        try {
            const report = await createMiningService(loadConfig()).healthCheck();
            console.log(JSON.stringify(report, null, 2));
            if (report.status !== 'healthy') process.exitCode = 1;
        } catch (error) {
            reportFailure(error);
        }
    });

program.parseAsync().catch(reportFailure);
