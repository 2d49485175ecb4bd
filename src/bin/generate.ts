import { Task, registerAllTasks } from "../task";

registerAllTasks();

// Filesystem and palette errors are not caught: the rejection exits non-zero.
const result = await Task.execute("generate");
process.exitCode = result.success ? 0 : 1;
