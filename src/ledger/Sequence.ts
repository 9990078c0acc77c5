import { LedgerState } from './WorldState';
import { CounterSchema } from './schemas';

// Monotonic identifier source. Starts at 1; a value is never handed out twice.
export class Sequence {
    private readonly key: string;

    constructor(private readonly state: LedgerState, name: string) {
        this.key = state.key('sequence', name);
    }

    async current(): Promise<number> {
        return (await this.state.read(this.key, CounterSchema)) ?? 0;
    }

    async next(): Promise<number> {
        const value = (await this.current()) + 1;
        await this.state.write(this.key, value);
        return value;
    }
}
