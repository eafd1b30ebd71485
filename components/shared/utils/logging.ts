import * as pulumi from "@pulumi/pulumi";

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

/**
 * Structured fields attached to a log line
 */
export type LogContext = Record<string, unknown>;

const LEVELS_BY_NAME: Record<string, LogLevel> = {
    DEBUG: LogLevel.DEBUG,
    INFO: LogLevel.INFO,
    WARN: LogLevel.WARN,
    ERROR: LogLevel.ERROR
};

/**
 * Minimum level from PULUMI_LOG_LEVEL, INFO when unset or unknown
 */
function minimumLevel(): LogLevel {
    const name = process.env.PULUMI_LOG_LEVEL?.toUpperCase() ?? '';
    return LEVELS_BY_NAME[name] ?? LogLevel.INFO;
}

function errorDetails(error: Error): LogContext {
    return { error: { name: error.name, message: error.message, stack: error.stack } };
}

/**
 * Send one line to the Pulumi log. Context is appended at DEBUG level or for errors.
 */
function write(level: LogLevel, message: string, baseContext: LogContext, context?: LogContext): void {
    if (process.env.NODE_ENV === 'test') {
        return;
    }

    const threshold = minimumLevel();
    if (level < threshold) {
        return;
    }

    const withContext = context && (threshold === LogLevel.DEBUG || level === LogLevel.ERROR);
    const line = withContext
        ? `${message} | Context: ${JSON.stringify({ ...baseContext, timestamp: new Date().toISOString(), ...context })}`
        : message;

    if (level === LogLevel.ERROR) {
        void pulumi.log.error(line);
    } else if (level === LogLevel.WARN) {
        void pulumi.log.warn(line);
    } else {
        void pulumi.log.info(level === LogLevel.DEBUG ? `DEBUG: ${line}` : line);
    }
}

/**
 * Logger bound to one component instance; lines read `[Type:name] message`
 */
export class ComponentLogger {
    private readonly prefix: string;
    private readonly baseContext: LogContext;

    constructor(componentType: string, componentName: string, additionalContext?: LogContext) {
        this.prefix = `[${componentType}:${componentName}]`;
        this.baseContext = { componentType, componentName, ...additionalContext };
    }

    public debug(message: string, context?: LogContext): void {
        write(LogLevel.DEBUG, `${this.prefix} ${message}`, this.baseContext, context);
    }

    public info(message: string, context?: LogContext): void {
        write(LogLevel.INFO, `${this.prefix} ${message}`, this.baseContext, context);
    }

    public warn(message: string, context?: LogContext): void {
        write(LogLevel.WARN, `${this.prefix} ${message}`, this.baseContext, context);
    }

    public error(message: string, error?: Error, context?: LogContext): void {
        write(LogLevel.ERROR, `${this.prefix} ${message}`, this.baseContext, {
            ...(error ? errorDetails(error) : {}),
            ...context
        });
    }

    /**
     * A resource was handed to the engine
     */
    public resourceDeclared(resourceType: string, resourceName: string, context?: LogContext): void {
        this.info(`Declared ${resourceType}: ${resourceName}`, { resourceType, resourceName, ...context });
    }

    public validationStarted(subject: string): void {
        this.debug(`Validating ${subject}`);
    }

    public validationPassed(subject: string): void {
        this.debug(`Valid ${subject}`);
    }

    public validationFailed(subject: string, error: Error): void {
        this.warn(`Invalid ${subject}: ${error.message}`, { errorName: error.name });
    }
}

/**
 * Logger for one automation run over a deployment file
 */
export class DeploymentLogger {
    public readonly deploymentName: string;
    private readonly baseContext: LogContext;

    constructor(deploymentName: string) {
        this.deploymentName = deploymentName;
        this.baseContext = { deploymentName };
    }

    public runStarted(operation: string, totalStacks: number): void {
        write(LogLevel.INFO, `🚀 Starting ${operation}: ${this.deploymentName}`, this.baseContext, { operation, totalStacks });
    }

    /**
     * Logged as a warning when any stack failed
     */
    public runFinished(successfulStacks: number, failedStacks: number, duration: number): void {
        const failed = failedStacks > 0;
        write(
            failed ? LogLevel.WARN : LogLevel.INFO,
            `${failed ? '⚠️' : '✅'} Finished ${this.deploymentName}: ${successfulStacks} succeeded, ${failedStacks} failed (${duration}ms)`,
            this.baseContext
        );
    }

    public stackStarted(stackName: string, action: string): void {
        write(LogLevel.INFO, `📦 ${action}: ${stackName}`, this.baseContext, { stackName });
    }

    public stackSucceeded(stackName: string, duration: number, outputs?: Record<string, unknown>): void {
        write(LogLevel.INFO, `✅ Stack completed: ${stackName}`, this.baseContext, {
            stackName,
            duration,
            outputs: outputs ? Object.keys(outputs) : []
        });
    }

    public stackFailed(stackName: string, error: Error, duration: number): void {
        write(LogLevel.ERROR, `❌ Stack failed: ${stackName}`, this.baseContext, {
            stackName,
            duration,
            ...errorDetails(error)
        });
    }

    public retrying(stackName: string, attempt: number, maxAttempts: number, delay: number): void {
        write(LogLevel.WARN, `🔄 Retrying ${stackName} (attempt ${attempt}/${maxAttempts}) after ${delay}ms`, this.baseContext, {
            stackName,
            attempt,
            delay
        });
    }
}

/**
 * Wall-clock timing of an automation run
 */
export class PerformanceMonitor {
    private readonly startTime = Date.now();

    public static start(): PerformanceMonitor {
        return new PerformanceMonitor();
    }

    /**
     * Elapsed milliseconds since start
     */
    public end(): number {
        return Date.now() - this.startTime;
    }
}
