import { Task, registerAllTasks } from "../task";

registerAllTasks();

const result = await Task.execute("validate");
process.exitCode = result.success ? 0 : 1;
