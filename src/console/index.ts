export { InputLoop, promptFor, type InputLoopOptions } from './input-loop.js';
