/**
 * Invalid or incomplete configuration. Fatal: the CLI reports it and exits 1.
 */
export class ConfigError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
        this.name = 'ConfigError';
    }
}
