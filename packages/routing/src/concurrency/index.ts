export { Mutex } from "./mutex.js";
export { withTimeout } from "./timeout.js";
