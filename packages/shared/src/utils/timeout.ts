import { TimeoutError } from '../errors.js';

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const expiry = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([work, expiry]);
    } finally {
        clearTimeout(timer);
    }
}
