import type { ChangeLogEntry, CommentEntry, ProjectInfo } from '../Domain/Project.js';
import { ChangeLog } from './ChangeLog.js';

/** Which optional sections `FormatProjectInfo` appends. */
export interface InfoFormatOptions {
    comments?: boolean;
    changeLog?: boolean;
}

function formatValue(value: unknown): string {
    if (value === null || value === undefined) {
        return `-`;
    }
    if (typeof value === `object`) {
        return JSON.stringify(value);
    }
    return String(value);
}

/**
 * Render comments in ascending id order.
 * @param projectId string Project shown in the heading
 * @param comments CommentEntry[] Live comments
 */
export function FormatComments(projectId: string, comments: CommentEntry[]): string {
    if (comments.length === 0) {
        return `No comments.`;
    }
    const lines = [...comments]
        .sort((a, b) => a.id - b.id)
        .map(comment => `  comment_${comment.id}: ${comment.body}`);
    return [`Comments for project ${projectId}:`, ...lines].join(`\n`);
}

/**
 * Render ledger entries, one per line, as `<key>: <timestamp>: <description>`.
 * Entries are printed in the order given.
 */
export function FormatChangeLog(projectId: string, entries: ChangeLogEntry[]): string {
    if (entries.length === 0) {
        return `No change log entries.`;
    }
    const lines = entries.map(entry => `  ${ChangeLog.Key(entry)}: ${entry.timestamp}: ${entry.description}`);
    return [`Change log for project ${projectId}:`, ...lines].join(`\n`);
}

/**
 * Render the info snapshot; comments and change log only when requested.
 */
export function FormatProjectInfo(
    info: ProjectInfo,
    comments: CommentEntry[],
    changeLog: ChangeLogEntry[],
    options: InfoFormatOptions = {},
): string {
    const projectId = info['Project ID'];
    const sections: string[] = [];
    const head = [`--- Project Info for ${projectId} ---`];

    for (const [key, value] of Object.entries(info)) {
        if (key === `Project ID` || key === `Comments`) {
            continue;
        }
        head.push(`${key}: ${formatValue(value)}`);
    }
    sections.push(head.join(`\n`));

    if (options.comments) {
        sections.push(FormatComments(projectId, comments));
    }
    if (options.changeLog) {
        sections.push(FormatChangeLog(projectId, changeLog));
    }
    return sections.join(`\n\n`);
}
