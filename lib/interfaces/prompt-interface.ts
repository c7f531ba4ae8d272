import * as readline from 'readline';

/**
 * Interactive question/answer abstraction interface for testability
 */
export interface IPrompt {
    /**
     * Writes the question to the terminal and resolves with the line typed back,
     * or undefined when input ended before a line was read
     */
    ask(question: string): Promise<string | undefined>;
}

/**
 * Default implementation reading a single line from stdin
 */
export class ReadlinePrompt implements IPrompt {
    ask(question: string): Promise<string | undefined> {
        const rl = readline.createInterface({
            input: process.stdin,
            output: process.stdout,
        });

        return new Promise((resolve) => {
            let answered = false;
            rl.question(question, (answer: string) => {
                answered = true;
                rl.close();
                resolve(answer);
            });
            rl.on('close', () => {
                if (!answered) {
                    resolve(undefined);
                }
            });
        });
    }
}
