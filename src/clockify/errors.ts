// Error taxonomy for the clockify CLI. Every kind ends the invocation.

export const EXIT_CODES = {
    success: 0,
    unexpected: 1,
    usage: 2,
    configuration: 3,
    api: 4,
    network: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class ClockifyError extends Error {
    constructor(
        message: string,
        public readonly exitCode: ExitCode
    ) {
        super(message);
        this.name = "ClockifyError";
    }
}

/** Bad command-line input: unknown command, missing argument, unparseable date */
export class UsageError extends ClockifyError {
    constructor(message: string) {
        super(message, EXIT_CODES.usage);
        this.name = "UsageError";
    }
}

/** Missing or invalid credentials and settings */
export class ConfigurationError extends ClockifyError {
    constructor(message: string) {
        super(message, EXIT_CODES.configuration);
        this.name = "ConfigurationError";
    }
}

/** The service answered with a non-2xx status or an unexpected body */
export class ApiError extends ClockifyError {
    constructor(
        public readonly method: string,
        public readonly path: string,
        public readonly status: number,
        message: string
    ) {
        super(message, EXIT_CODES.api);
        this.name = "ApiError";
    }

    get isAuthError(): boolean {
        return this.status === 401 || this.status === 403;
    }
}

/** The request never got an HTTP answer: DNS, refused connection, timeout */
export class NetworkError extends ClockifyError {
    constructor(message: string) {
        super(message, EXIT_CODES.network);
        this.name = "NetworkError";
    }
}
