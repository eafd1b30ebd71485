/**
 * Custom error types for different component scenarios
 */
export class ComponentError extends Error {
    public readonly componentType: string;
    public readonly componentName: string;
    public readonly errorCode: string;
    public readonly timestamp: Date;
    public readonly context?: Record<string, unknown>;

    constructor(
        componentType: string,
        componentName: string,
        message: string,
        errorCode: string = 'COMPONENT_ERROR',
        context?: Record<string, unknown>
    ) {
        super(`[${componentType}:${componentName}] ${message}`);
        this.name = 'ComponentError';
        this.componentType = componentType;
        this.componentName = componentName;
        this.errorCode = errorCode;
        this.timestamp = new Date();
        this.context = context;
    }
}

export class ValidationError extends ComponentError {
    constructor(
        componentType: string,
        componentName: string,
        fieldName: string,
        value: unknown,
        expectedType?: string,
        context?: Record<string, unknown>
    ) {
        const message = expectedType
            ? `Invalid ${fieldName}: expected ${expectedType}, got ${typeof value} (${String(value)})`
            : `Invalid ${fieldName}: ${String(value)}`;

        super(componentType, componentName, message, 'VALIDATION_ERROR', {
            fieldName,
            value,
            expectedType,
            ...context
        });
        this.name = 'ValidationError';
    }
}

export class ConfigurationError extends ComponentError {
    public readonly configPath: string;

    constructor(
        componentType: string,
        componentName: string,
        configPath: string,
        message: string,
        context?: Record<string, unknown>
    ) {
        super(componentType, componentName, `Configuration error at '${configPath}': ${message}`, 'CONFIGURATION_ERROR', {
            configPath,
            ...context
        });
        this.name = 'ConfigurationError';
        this.configPath = configPath;
    }
}

/**
 * Error codes that describe a fault in the declaration itself; retrying cannot fix them.
 */
export const NON_RETRYABLE_ERROR_CODES: ReadonlySet<string> = new Set([
    'VALIDATION_ERROR',
    'CONFIGURATION_ERROR',
    'OUTPUT_MISMATCH',
    'DRIFT_DETECTED'
]);

export function isRetryableError(error: Error): boolean {
    return !(error instanceof ComponentError && NON_RETRYABLE_ERROR_CODES.has(error.errorCode));
}

/**
 * Error recovery strategies
 */
export enum RecoveryStrategy {
    RETRY = 'retry',
    FAIL_FAST = 'fail_fast'
}

export interface RecoveryOptions {
    strategy: RecoveryStrategy;
    maxRetries?: number;
    retryDelay?: number;
    backoffMultiplier?: number;
    isRetryable?: (error: Error) => boolean;
    onRetry?: (attempt: number, maxAttempts: number, delay: number, error: Error) => void;
}

/**
 * Error handler with recovery mechanisms
 */
export class ErrorHandler {
    private static readonly DEFAULT_RETRY_DELAY = 1000;
    private static readonly DEFAULT_MAX_RETRIES = 3;
    private static readonly DEFAULT_BACKOFF_MULTIPLIER = 2;

    /**
     * Execute an operation, retrying with exponential backoff under the RETRY strategy.
     * The error that ends the loop is wrapped with component context.
     */
    public static async executeWithRecovery<T>(
        operation: () => Promise<T>,
        operationName: string,
        componentType: string,
        componentName: string,
        options: RecoveryOptions
    ): Promise<T> {
        const maxRetries = options.maxRetries ?? this.DEFAULT_MAX_RETRIES;
        const isRetryable = options.isRetryable ?? isRetryableError;
        let attempt = 0;

        for (;;) {
            try {
                return await operation();
            } catch (error) {
                const lastError = error instanceof Error ? error : new Error(String(error));
                attempt++;

                const exhausted = attempt > maxRetries;
                if (options.strategy === RecoveryStrategy.FAIL_FAST || exhausted || !isRetryable(lastError)) {
                    throw this.wrapError(lastError, componentType, componentName, operationName, attempt);
                }

                const delay = this.calculateDelay(attempt, options);
                options.onRetry?.(attempt + 1, maxRetries + 1, delay, lastError);
                await this.sleep(delay);
            }
        }
    }

    /**
     * Wrap an error with component context
     */
    public static wrapError(
        error: Error,
        componentType: string,
        componentName: string,
        operationName: string,
        attempts?: number
    ): ComponentError {
        if (error instanceof ComponentError) {
            return error;
        }

        return new ComponentError(
            componentType,
            componentName,
            `Operation '${operationName}' failed: ${error.message}`,
            'OPERATION_FAILED',
            {
                operationName,
                originalError: error.message,
                attempts
            }
        );
    }

    /**
     * Calculate retry delay with exponential backoff
     */
    public static calculateDelay(attempt: number, options: RecoveryOptions): number {
        const baseDelay = options.retryDelay ?? this.DEFAULT_RETRY_DELAY;
        const multiplier = options.backoffMultiplier ?? this.DEFAULT_BACKOFF_MULTIPLIER;
        return baseDelay * Math.pow(multiplier, attempt - 1);
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}

/**
 * Validation utilities with GCP naming rules
 */
export class ValidationUtils {
    public static validateRequired<T>(
        value: T | undefined | null,
        fieldName: string,
        componentType: string,
        componentName: string,
        expectedType?: string
    ): T {
        if (value === undefined || value === null) {
            throw new ValidationError(componentType, componentName, fieldName, value, expectedType || 'non-null value');
        }
        return value;
    }

    /**
     * Validate string format with regex
     */
    public static validateFormat(
        value: string,
        fieldName: string,
        pattern: RegExp,
        componentType: string,
        componentName: string,
        formatDescription?: string
    ): void {
        if (typeof value !== 'string' || !pattern.test(value)) {
            throw new ValidationError(
                componentType,
                componentName,
                fieldName,
                value,
                formatDescription || `string matching ${pattern}`,
                { pattern: pattern.source }
            );
        }
    }

    public static validateProjectId(projectId: string, componentType: string, componentName: string): void {
        this.validateFormat(
            projectId,
            'project',
            /^[a-z][a-z0-9-]{4,28}[a-z0-9]$/,
            componentType,
            componentName,
            'GCP project id (6-30 chars, lowercase letters, digits, hyphens)'
        );
    }

    public static validateRegion(region: string, componentType: string, componentName: string): void {
        this.validateFormat(
            region,
            'region',
            /^[a-z]+-[a-z]+\d+$/,
            componentType,
            componentName,
            'GCP region format (e.g., us-central1)'
        );
    }

    public static validateDatasetId(datasetId: string, componentType: string, componentName: string): void {
        this.validateFormat(
            datasetId,
            'datasetId',
            /^[A-Za-z0-9_]{1,1024}$/,
            componentType,
            componentName,
            'BigQuery dataset id (letters, digits, underscores)'
        );
    }

    /**
     * Cloud Storage bucket names: 3-63 characters, lowercase letters, digits,
     * hyphens, underscores and dots, alphanumeric at both ends, no "goog" prefix.
     */
    public static validateBucketName(bucketName: string, componentType: string, componentName: string): void {
        this.validateFormat(
            bucketName,
            'bucketName',
            /^[a-z0-9][a-z0-9._-]{1,61}[a-z0-9]$/,
            componentType,
            componentName,
            'Cloud Storage bucket name (3-63 chars, lowercase letters, digits, -, _, .)'
        );

        if (bucketName.startsWith('goog')) {
            throw new ValidationError(
                componentType,
                componentName,
                'bucketName',
                bucketName,
                'bucket name not starting with "goog"'
            );
        }
    }

    public static validateLocation(location: string, componentType: string, componentName: string): void {
        this.validateFormat(
            location,
            'location',
            /^[A-Za-z]+[A-Za-z0-9-]*$/,
            componentType,
            componentName,
            'Cloud Storage location (e.g., US, EU, us-central1)'
        );
    }

    public static validateServiceAccountEmail(email: string, componentType: string, componentName: string): void {
        this.validateFormat(
            email,
            'impersonateServiceAccount',
            /^[^@\s]+@[^@\s]+\.gserviceaccount\.com$/,
            componentType,
            componentName,
            'service account email'
        );
    }

    /**
     * Validate GCP resource labels (lowercase keys and values, at most 63 chars each)
     */
    public static validateLabels(
        labels: Record<string, string>,
        componentType: string,
        componentName: string
    ): void {
        for (const [key, value] of Object.entries(labels)) {
            this.validateFormat(key, 'label key', /^[a-z][a-z0-9_-]{0,62}$/, componentType, componentName, 'label key');
            this.validateFormat(value, `label.${key}`, /^[a-z0-9_-]{0,63}$/, componentType, componentName, 'label value');
        }
    }
}
