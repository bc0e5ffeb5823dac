/**
 * Safely extract an error message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export class Helpers {
  static delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Collapse runs of whitespace (including non-breaking spaces) and trim.
   */
  static normalizeText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }
}
