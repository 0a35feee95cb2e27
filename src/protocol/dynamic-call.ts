// src/protocol/dynamic-call.ts
// The escape hatch: a call whose method no backend command covers is
// forwarded to the library object under the same name.

import type { CallRecord } from '../store/IState';

export interface DynamicCall {
    kind: 'dynamic';
    method: string;
    args: unknown[];
    kwargs: Record<string, unknown>;
}

export function toDynamicCall(record: CallRecord): DynamicCall {
    return { kind: 'dynamic', method: record.method, args: record.args, kwargs: record.kwargs };
}

export function isDynamicCall(command: { kind: string }): command is DynamicCall {
    return command.kind === 'dynamic';
}

/**
 * Calls `target[method](...args)` when the target exposes a public function
 * under that name. Keyword arguments, if any, travel as a trailing object.
 * Returns false (after a warning) when there is nothing to call.
 */
export function invokeDynamic(target: object, call: DynamicCall, label: string): boolean {
    if (call.method.startsWith('_') || call.method === 'constructor') {
        console.warn(`[CallDispatcher] Refusing to call non-public ${label} member "${call.method}".`);
        return false;
    }
    const member: unknown = Reflect.get(target, call.method);
    if (typeof member !== 'function') {
        console.warn(`[CallDispatcher] Unknown ${label} method "${call.method}"; call skipped.`);
        return false;
    }
    const args = Object.keys(call.kwargs).length > 0 ? [...call.args, call.kwargs] : call.args;
    Reflect.apply(member, target, args);
    return true;
}
