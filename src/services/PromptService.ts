import { Injectable, ProviderScope } from "@tsed/di";
import readline from "readline";

export class InputClosedError extends Error {
    constructor() {
        super("Input closed");
        this.name = "InputClosedError";
    }
}

export interface NumberBounds {
    min?: number;
    max?: number;
}

/**
 * Terminal I/O for the menus. Helpers keep asking until the answer is valid,
 * so validation problems never leave this service.
 */
@Injectable({
    scope: ProviderScope.SINGLETON
})
export class PromptService {
    input: NodeJS.ReadableStream = process.stdin;
    output: NodeJS.WritableStream = process.stdout;

    private rl: readline.Interface | null = null;
    private closed = false;
    // piped input can deliver several lines before the next question
    private pending: string[] = [];
    private waiting: { resolve: (line: string) => void; reject: (err: Error) => void } | null = null;

    private getInterface(): readline.Interface {
        if (!this.rl) {
            this.rl = readline.createInterface({ input: this.input, output: this.output });
            this.rl.on("line", (line) => {
                const waiting = this.waiting;
                this.waiting = null;
                if (waiting) {
                    waiting.resolve(line);
                } else {
                    this.pending.push(line);
                }
            });
            this.rl.on("close", () => {
                this.closed = true;
                this.waiting?.reject(new InputClosedError());
                this.waiting = null;
            });
        }
        return this.rl;
    }

    print(message: string = ""): void {
        console.log(message);
    }

    ask(question: string): Promise<string> {
        const rl = this.getInterface();
        if (!this.closed) {
            rl.setPrompt(question);
            rl.prompt();
        }

        const line = this.pending.shift();
        if (line !== undefined) {
            return Promise.resolve(line);
        }
        if (this.closed) {
            return Promise.reject(new InputClosedError());
        }
        return new Promise((resolve, reject) => {
            this.waiting = { resolve, reject };
        });
    }

    async askNonEmpty(question: string, emptyMessage: string): Promise<string> {
        for (;;) {
            const answer = (await this.ask(question)).trim();
            if (answer) return answer;
            this.print(emptyMessage);
        }
    }

    async askNumber(question: string, bounds: NumberBounds = {}): Promise<number> {
        const { min = -Infinity, max = Infinity } = bounds;
        for (;;) {
            const answer = (await this.ask(question)).trim();
            const value = Number(answer);
            if (answer === "" || !Number.isFinite(value)) {
                this.print("Invalid input. Please enter a number.");
            } else if (value < min || value > max) {
                this.print(`Please enter a number between ${min} and ${max}.`);
            } else {
                return value;
            }
        }
    }

    async askYesNo(question: string): Promise<boolean> {
        for (;;) {
            const answer = (await this.ask(question)).trim().toLowerCase();
            if (answer === "y" || answer === "n") return answer === "y";
            this.print("Invalid input. Please enter 'y' for yes or 'n' for no.");
        }
    }

    async waitForEnter(): Promise<void> {
        while ((await this.ask("Press Enter to continue...")) !== "") {
            // only a bare Enter continues
        }
    }

    close(): void {
        this.rl?.close();
    }

    $onDestroy(): void {
        this.close();
    }
}
