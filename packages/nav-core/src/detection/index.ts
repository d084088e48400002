export { StateDetector } from './state-detector.js';
