// packages/memory/src/pulses.ts
import type { PulseRepository, UserRepository } from "./repositories";
import type { Pulse, PulseValues } from "./types";

export class PulseStore {
  constructor(
    private readonly pulses: PulseRepository,
    private readonly users: UserRepository,
  ) {}

  get(userId: number): Promise<Pulse | null> {
    return this.pulses.find(userId);
  }

  save(values: PulseValues): Promise<Pulse> {
    return this.pulses.upsert(values);
  }

  dueUserIds(now: Date): Promise<number[]> {
    return this.pulses.listDueUserIds(now);
  }

  activeUserIds(): Promise<number[]> {
    return this.users.listActiveIds();
  }
}
