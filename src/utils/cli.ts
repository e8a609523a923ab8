/**
 * CLI Formatting Utility
 *
 * Terminal output for the cpmm command using chalk, boxen and figures,
 * with log-symbols for the status marks.
 */

import chalk from 'chalk';
import boxen, { type Options as BoxenOptions } from 'boxen';
import figures from 'figures';
import logSymbols from 'log-symbols';

// ==================== SYMBOLS ====================

export const sym = {
    success: logSymbols.success,
    error: logSymbols.error,
    warning: logSymbols.warning,
    info: logSymbols.info,

    arrow: figures.arrowRight,

    rocket: '🚀',
    gem: '💎',
    lightning: '⚡',
    check: '✅',
    warning_emoji: '⚠️',
};

// ==================== COLORS ====================

export const c = {
    primary: chalk.cyan,
    success: chalk.green,
    error: chalk.red,

    bold: chalk.bold,

    label: chalk.gray,
    value: chalk.white,
};

// ==================== BOX STYLES ====================

const defaultBoxStyle: BoxenOptions = {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
};

export function successBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'green',
        title: title || `${sym.success} Success`,
        titleAlignment: 'center',
    });
}

export function warningBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'yellow',
        title: title || `${sym.warning} Warning`,
        titleAlignment: 'center',
    });
}

export function infoBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'blue',
        title: title || `${sym.info} Info`,
        titleAlignment: 'center',
    });
}

/**
 * Aligned "label: value" lines for a box body
 */
export function rows(pairs: Array<[string, string]>): string {
    const width = Math.max(...pairs.map(([label]) => label.length)) + 1;
    return pairs
        .map(([label, value]) => `${c.label(`${label}:`.padEnd(width))} ${c.value(value)}`)
        .join('\n');
}

// ==================== MESSAGES ====================

export function success(msg: string): void {
    console.log(`${sym.success} ${c.success(msg)}`);
}

export function error(msg: string): void {
    console.log(`${sym.error} ${c.error(msg)}`);
}

export default {
    sym,
    c,
    successBox,
    warningBox,
    infoBox,
    rows,
    success,
    error,
};
