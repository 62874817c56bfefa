/**
 * Thrown by the input string cleaner when the raw input is not well-formed UTF-8.
 * Nothing is cleaned in that case: the whole value is rejected.
 */
export class InvalidUtf8Error extends Error {
  constructor() {
    super('Input is not valid UTF-8');
    this.name = 'InvalidUtf8Error';
  }
}
