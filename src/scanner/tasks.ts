import type { SubTask } from '../core/work-item/types.js';

const TASK_HEADING = /^##\s+(task-\S+):\s*(.+)$/i;

/** `## task-N: Title` headings in order; the lines under each become its description. */
export function parseTasks(content: string): SubTask[] {
  const tasks: SubTask[] = [];
  let current: { id: string; title: string; lines: string[] } | null = null;

  const flush = () => {
    if (current) tasks.push({ id: current.id, title: current.title, description: current.lines.join('\n').trim() });
    current = null;
  };

  for (const line of content.split(/\r?\n/)) {
    const m = TASK_HEADING.exec(line);
    if (m) {
      flush();
      current = { id: m[1], title: m[2].trim(), lines: [] };
    } else if (current) {
      current.lines.push(line);
    }
  }
  flush();

  return tasks;
}
