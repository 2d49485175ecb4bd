export { Task, type TaskContext, type TaskResult, type TaskDefinition } from "./task";
export { GenerateTask } from "./generate";
export { ValidateTask, type FileReport } from "./validate";

import { Task } from "./task";
import { GenerateTask } from "./generate";
import { ValidateTask } from "./validate";

export function registerAllTasks(): void {
  // Tasks register on import; referencing them keeps the imports alive.
  void GenerateTask;
  void ValidateTask;
}

export function getAllTasks() {
  registerAllTasks();
  return Task.list();
}
