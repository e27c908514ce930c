/**
 * Thrown when an expression traps at run time, e.g. an integer division by zero or a load
 * outside of its buffer. The reason is always required.
 *
 * @param reason the reason of this exception.
 */
export default class PanicException extends Error {
  constructor(reason: string) {
    super(reason);
  }
}
