// ========================================
// Smart Inspection - Operator Console
// ========================================

import readline from 'readline';

/** Line-oriented operator I/O. ask() resolves null once input has ended. */
export interface OperatorConsole {
    ask(question: string): Promise<string | null>;
    print(line: string): void;
    close(): void;
}

/**
 * readline-backed console. Ctrl-C and end of input both resolve the pending
 * question with null so the dialogue loop can exit normally. While the
 * interface is open readline takes Ctrl-C itself; `onInterrupt` receives it.
 * Without one the console just closes.
 */
export class TerminalConsole implements OperatorConsole {
    private readonly rl: readline.Interface;
    private ended = false;
    private pending: ((answer: string | null) => void) | null = null;

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        private readonly output: NodeJS.WritableStream = process.stdout,
        onInterrupt?: () => void,
    ) {
        this.rl = readline.createInterface({ input, output });
        this.rl.on('close', () => this.finish());
        this.rl.on('SIGINT', () => {
            if (onInterrupt) onInterrupt();
            else this.rl.close();
        });
    }

    ask(question: string): Promise<string | null> {
        if (this.ended) return Promise.resolve(null);
        return new Promise((resolve) => {
            this.pending = resolve;
            this.rl.question(question, (answer) => {
                this.pending = null;
                resolve(answer);
            });
        });
    }

    print(line: string): void {
        this.output.write(line + '\n');
    }

    close(): void {
        this.rl.close();
    }

    private finish(): void {
        this.ended = true;
        const resolve = this.pending;
        this.pending = null;
        resolve?.(null);
    }
}
