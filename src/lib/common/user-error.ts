/** Error for errors that come from the caller's input.
 * - The message is meant to be shown back to whoever supplied the input.
 */
export class UserError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UserError";
  }
}
