import { TransferError, type MusicService } from '@app/contracts';

const normalizeLabel = (label: string): string => label.trim().toLowerCase();

/**
 * Maps user-facing service labels ("spotify", "YouTube") to configured
 * MusicService instances. Labels are matched case-insensitively.
 */
export class ServiceRegistry {
  private readonly services = new Map<string, MusicService>();

  constructor(entries: Record<string, MusicService> = {}) {
    for (const [label, service] of Object.entries(entries)) {
      this.register(label, service);
    }
  }

  register(label: string, service: MusicService): this {
    const key = normalizeLabel(label);
    if (key.length === 0) {
      throw new TransferError('missing_argument', 'service label is required');
    }
    this.services.set(key, service);
    return this;
  }

  labels(): string[] {
    return [...this.services.keys()].sort();
  }

  resolve(label: string): MusicService {
    const key = normalizeLabel(label);
    if (key.length === 0) {
      throw new TransferError('missing_argument', 'service label is required');
    }

    const service = this.services.get(key);
    if (!service) {
      throw new TransferError('invalid_argument', `unknown service "${label}"`, {
        details: { known: this.labels() },
      });
    }
    return service;
  }
}
