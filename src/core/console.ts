import chalk from 'chalk';

/**
 * Pretty console output for user-facing messages
 * Separate from structured JSON logs
 */

const icons = {
    info: 'ℹ',
    success: '✓',
    warning: '⚠',
    error: '✗',
    question: '?',
    pause: '⏸',
    plan: '🗺',
    brain: '🧠',
};

export const console_log = {
    header: (text: string) => {
        console.log('\n' + chalk.bold.cyan('═'.repeat(80)));
        console.log(chalk.bold.cyan(`  ${text}`));
        console.log(chalk.bold.cyan('═'.repeat(80)) + '\n');
    },

    section: (text: string) => {
        console.log('\n' + chalk.bold.white(`▸ ${text}`));
    },

    info: (text: string, detail?: string) => {
        console.log(chalk.blue(`  ${icons.info}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    success: (text: string, detail?: string) => {
        console.log(chalk.green(`  ${icons.success}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    warning: (text: string, detail?: string) => {
        console.log(chalk.yellow(`  ${icons.warning}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    error: (text: string, detail?: string) => {
        console.log(chalk.red(`  ${icons.error}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    question: (text: string) => {
        console.log(chalk.magenta(`  ${icons.question}  ${text}`));
    },

    pause: (text: string, detail?: string) => {
        console.log(chalk.yellow(`  ${icons.pause}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    plan: (text: string, detail?: string) => {
        console.log(chalk.cyan(`  ${icons.plan}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    classify: (text: string, detail?: string) => {
        console.log(chalk.magenta(`  ${icons.brain}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : ''));
    },

    dim: (text: string) => {
        console.log(chalk.gray(`     ${text}`));
    },

    divider: () => {
        console.log(chalk.gray('  ' + '─'.repeat(76)));
    }
};
