import process from "node:process";
import * as readline from "node:readline";

export interface Display {
    /** replaces whatever is on screen with `text` */
    show(text: string): void;
    announce(message: string): void;
}

export class TerminalDisplay implements Display {
    constructor(private stream: NodeJS.WritableStream = process.stdout) {}

    show(text: string): void {
        readline.cursorTo(this.stream, 0, 0);
        readline.clearScreenDown(this.stream);
        this.stream.write(`${text}\n`);
    }

    announce(message: string): void {
        this.stream.write(`${message}\n`);
    }
}
