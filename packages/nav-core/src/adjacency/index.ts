export { AdjacentStates } from './adjacent-states.js';
