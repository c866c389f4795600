export { scopesFor, assertPurpose, isPurpose } from './scope-mapper.js';
