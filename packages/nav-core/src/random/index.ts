export { mathRandomSource } from './random-source.js';
