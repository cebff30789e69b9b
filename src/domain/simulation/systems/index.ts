export { TaskSystem } from "./tasks/TaskSystem";
export { TaskSelector } from "./tasks/TaskSelector";
export { TaskExecutor } from "./tasks/TaskExecutor";
export { PopulationSystem } from "./population/PopulationSystem";
export { DefenseSystem } from "./defense/DefenseSystem";
