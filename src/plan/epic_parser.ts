import { EpicPlan, EpicTask } from './types.js';
import { EmptyTasksError, MissingTasksError, MissingTitleError } from './errors.js';
import { matchBullet } from './bullets.js';

const EPIC_TITLE_RE = /^#\s*EPIC:\s*(.+)$/;
const TASKS_HEADER_RE = /^##\s*TASKS/;

/**
 * Parse an epic breakdown of the form:
 *
 * ```
 * # EPIC: Title
 * Description...
 *
 * ## TASKS
 * - [ ] Task 1
 * - Task 2
 * ```
 */
export function parseEpicPlan(text: string): EpicPlan {
    const lines = text.split(/\r?\n/).map(line => line.trim());

    const titleIndex = lines.findIndex(line => EPIC_TITLE_RE.test(line));
    const titleMatch = titleIndex === -1 ? null : EPIC_TITLE_RE.exec(lines[titleIndex]);
    const title = titleMatch?.[1]?.trim() ?? '';
    if (!title) {
        throw new MissingTitleError(text);
    }

    const descriptionLines: string[] = [];
    let tasksStart = -1;
    for (let i = titleIndex + 1; i < lines.length; i++) {
        if (TASKS_HEADER_RE.test(lines[i])) {
            tasksStart = i + 1;
            break;
        }
        if (lines[i]) descriptionLines.push(lines[i]);
    }

    if (tasksStart === -1) {
        throw new MissingTasksError(text);
    }

    const tasks: EpicTask[] = [];
    for (const line of lines.slice(tasksStart)) {
        const bullet = matchBullet(line);
        if (bullet) tasks.push({ summary: bullet.text });
    }

    if (tasks.length === 0) {
        throw new EmptyTasksError(text);
    }

    return { title, description: descriptionLines.join('\n'), tasks };
}
