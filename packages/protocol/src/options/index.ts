/**
 * Engine option declarations and assignments
 */

export { EMPTY_STRING, formatOptionDeclaration, parseOptionDeclaration } from './declaration.js';

export {
  formatOptionAssignment,
  readCheckValue,
  readSpinValue,
  readOpponent,
} from './assignment.js';
