import readline from 'node:readline';
import type { Member } from './types.js';

const timeOf = (date: Date) => date.toTimeString().slice(0, 8);

/**
 * Line-based chat over stdin/stdout. Every non-empty line typed is handed to
 * `send`; incoming messages and member changes are printed.
 */
export class ChatConsole {
  private rl?: readline.Interface;

  constructor(
    private readonly send: (message: string) => void,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  start(input: NodeJS.ReadableStream = process.stdin): void {
    const rl = readline.createInterface({ input, terminal: false });
    rl.on('line', (line) => {
      const message = line.trim();
      if (message) this.send(message);
    });
    this.rl = rl;
  }

  close(): void {
    this.rl?.close();
    this.rl = undefined;
  }

  printMessage(nickname: string, message: string, at = new Date()): void {
    this.output.write(`[${timeOf(at)}] ${nickname}: ${message}\n`);
  }

  printMembers(members: Member[]): void {
    const names = members.map((member) => (member.role === 'sender' ? `${member.nickname} (host)` : member.nickname));
    this.output.write(`* ${members.length} in the room: ${names.join(', ')}\n`);
  }

  printError(message: string): void {
    this.output.write(`! ${message}\n`);
  }
}
