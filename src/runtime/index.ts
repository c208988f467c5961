export { done, next, trampoline } from './trampoline.js';
