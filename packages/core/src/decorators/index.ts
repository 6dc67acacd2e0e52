export { Inject } from './inject.js';
export { Overload } from './overload.js';
