/**
 * Monotonic counter naming the query whose results may currently be shown.
 *
 * Asynchronous work captures the value at submission and compares it with
 * {@link GenerationController.current} before touching shared state, again
 * after every `await`. Only the owning event loop calls {@link bump}.
 */
export class GenerationController {
  #current = 0;

  /** Advances to, and returns, a new generation. */
  bump(): number {
    return ++this.#current;
  }

  current(): number {
    return this.#current;
  }

  isCurrent(generation: number): boolean {
    return generation === this.#current;
  }
}
