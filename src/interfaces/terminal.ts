/**
 * Line-based console I/O used by the interactive loop
 */
export interface Terminal {
  ask(question: string): Promise<string>;
  print(message: string): void;
  close(): void;
}
