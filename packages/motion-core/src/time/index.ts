export { createDiscreteTime } from './discrete-time.js';
