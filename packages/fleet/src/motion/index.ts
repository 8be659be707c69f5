export { stepToward, type StepResult } from "./motion.js";
