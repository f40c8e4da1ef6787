export class TaskRegistryError extends Error {
    constructor(
        message: string,
        public readonly code: string,
    ) {
        super(message);
        this.name = this.constructor.name;
    }
}

export class UnknownTaskError extends TaskRegistryError {
    constructor(public readonly taskName: string, registered: string[] = []) {
        super(`Task "${taskName}" is not registered. Registered: [${registered.join(', ')}]`, 'UNKNOWN_TASK');
    }
}

export class DuplicateTaskError extends TaskRegistryError {
    constructor(public readonly taskName: string) {
        super(`Task "${taskName}" is already registered`, 'DUPLICATE_TASK');
    }
}

export class InvalidTaskNameError extends TaskRegistryError {
    constructor(message: string) {
        super(message, 'INVALID_TASK_NAME');
    }
}
