import chalk from 'chalk';

export interface SpinnerOptions {
    stream?: NodeJS.WriteStream;
    /** Off when the stream is not a terminal; `start` and `update` then do nothing. */
    enabled?: boolean;
}

export class Spinner {
    private timer: NodeJS.Timeout | null = null;
    private frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
    private currentFrame = 0;
    private text: string;
    private readonly stream: NodeJS.WriteStream;
    private readonly enabled: boolean;

    constructor(text: string = 'Investigating...', options: SpinnerOptions = {}) {
        this.text = text;
        this.stream = options.stream ?? process.stderr;
        this.enabled = options.enabled ?? Boolean(this.stream.isTTY);
    }

    get running(): boolean {
        return this.timer !== null;
    }

    start(text?: string) {
        if (text) this.text = text;
        if (this.timer || !this.enabled) return;

        this.currentFrame = 0;
        this.stream.write('\x1B[?25l'); // Hide cursor

        this.timer = setInterval(() => {
            const frame = this.frames[this.currentFrame];
            this.currentFrame = (this.currentFrame + 1) % this.frames.length;

            this.stream.write(`\r\x1B[K${chalk.cyan(frame)} ${this.text}`);
        }, 80);
    }

    update(text: string) {
        this.text = text;
    }

    stop(finalText?: string, symbol: string = '✓') {
        const wasRunning = this.timer !== null;
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }

        if (wasRunning) {
            this.stream.write('\r\x1B[K'); // Clear line
            this.stream.write('\x1B[?25h'); // Show cursor
        }
        if (finalText) {
            this.stream.write(`${chalk.green(symbol)} ${finalText}\n`);
        }
    }
}
