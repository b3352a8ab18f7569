// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

export type Result<T, E = string> = Ok<T> | Err<E>;

export interface Ok<T> {
    readonly isOk: true;
    readonly value: T;
}

export interface Err<E> {
    readonly isOk: false;
    readonly error: E;
}

export namespace Result {
    export function ok<T>(value: T): Ok<T> {
        return { isOk: true, value };
    }

    export function err<E = string>(error: E): Err<E> {
        return { isOk: false, error };
    }

    /**
     * Runs `action` and turns a thrown error into `Result.err` with its message.
     */
    export function from<T>(action: () => T): Result<T> {
        try {
            return ok(action());
        } catch (e) {
            return err(errorMessage(e));
        }
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
