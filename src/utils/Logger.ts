export class Logger {
    private static isDebugMode = false;

    // Restore the flag from the environment so debug output can be switched on per run
    static init(env: NodeJS.ProcessEnv = process.env) {
        this.isDebugMode = env.CUBE_DEBUG === 'true' || env.CUBE_DEBUG === '1';
        if (this.isDebugMode) {
            console.log('[Logger] Debug mode restored from CUBE_DEBUG');
        }
    }

    static enable() {
        this.isDebugMode = true;
        console.log('[Logger] Debug mode enabled');
    }

    static disable() {
        this.isDebugMode = false;
        console.log('[Logger] Debug mode disabled');
    }

    static isEnabled(): boolean {
        return this.isDebugMode;
    }

    static log(tag: string, message: string, ...args: unknown[]) {
        if (this.isDebugMode) {
            console.log(`[${tag}]`, message, ...args);
        }
    }

    static warn(tag: string, message: string, ...args: unknown[]) {
        if (this.isDebugMode) {
            console.warn(`[${tag}]`, message, ...args);
        }
    }

    static error(tag: string, message: string, error?: unknown) {
        // Errors are always shown
        console.error(`[${tag}]`, message, error ?? '');
    }
}

// Initialize immediately
Logger.init();
