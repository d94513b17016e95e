import { chmod, mkdir, writeFile } from 'fs/promises';
import type { Task } from '../tasks/task.js';

/**
 * Write the files the VM reads on boot: the instructions, the starting
 * commit, the task id and the credential. The VM deletes .api-key once read.
 */
export async function writeTaskFiles(task: Task, apiKey: string, startRef: string): Promise<void> {
  await mkdir(task.taskDir, { recursive: true });

  await writeFile(task.descriptionPath, task.description);
  await writeFile(task.startRefPath, startRef);
  await writeFile(task.taskIdPath, task.id);

  await writeFile(task.apiKeyPath, apiKey, { mode: 0o600 });
  await chmod(task.apiKeyPath, 0o600);
}
