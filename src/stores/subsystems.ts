import type { Subsystem } from '../types/namespace';

/**
 * Read-only view of the subsystems known to this agent. Subsystems are
 * provisioned elsewhere; the namespace controller only resolves them.
 */
export interface SubsystemDirectory {
  get(name: string): Promise<Subsystem | undefined>;
}

export class InMemorySubsystemDirectory implements SubsystemDirectory {
  private readonly subsystems = new Map<string, Subsystem>();

  constructor(entries: Subsystem[] = []) {
    entries.forEach((entry) => this.register(entry));
  }

  async get(name: string): Promise<Subsystem | undefined> {
    return this.subsystems.get(name);
  }

  register(subsystem: Subsystem): void {
    this.subsystems.set(subsystem.name, subsystem);
  }

  unregister(name: string): boolean {
    return this.subsystems.delete(name);
  }

  names(): string[] {
    return [...this.subsystems.keys()];
  }
}

/**
 * Parse `subsystems/a=nqn.x,subsystems/b=nqn.y` into subsystem entries.
 */
export function parseSubsystemList(value: string | undefined): Subsystem[] {
  if (!value) return [];
  return value
    .split(',')
    .map((pair) => pair.trim())
    .filter(Boolean)
    .map((pair) => {
      const idx = pair.indexOf('=');
      if (idx <= 0 || idx === pair.length - 1) {
        throw new Error(`Invalid subsystem entry '${pair}', expected <name>=<nqn>`);
      }
      return { name: pair.slice(0, idx).trim(), spec: { nqn: pair.slice(idx + 1).trim() } };
    });
}
