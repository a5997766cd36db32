export { Accepts } from './accepts.js';
export { Constructs } from './constructs.js';
export { Implements } from './implements.js';
