export { MotionFlow, type MotionFlowOptions } from './motion-flow.js';
