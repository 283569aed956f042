export interface ServiceLocation {
  file: string;
  service: string;
  /** 0-based index of the line that opened the block. */
  lineStart: number;
  /** 0-based index of the last content line of the block, inclusive. */
  lineEnd: number;
  indent: number;
  /** Set when the block was opened by a plain `name:` line whose siblings form its body. */
  inline?: boolean;
}

export type LocationLookup =
  | { found: false }
  | { found: true; location: ServiceLocation; empty: boolean };

export function toLookup(location: ServiceLocation): LocationLookup {
  return { found: true, location, empty: location.lineEnd === location.lineStart };
}

export class LocationRecorder {
  private readonly locations = new Map<string, Map<string, ServiceLocation[]>>();

  /** Stores a closed block. Repeated names keep every block in file order. */
  record(location: ServiceLocation): void {
    let byService = this.locations.get(location.file);
    if (!byService) {
      byService = new Map();
      this.locations.set(location.file, byService);
    }
    const occurrences = byService.get(location.service) ?? [];
    occurrences.push(location);
    byService.set(location.service, occurrences);
  }

  /** The last block recorded under the name. */
  lookup(file: string, service: string): LocationLookup {
    const location = this.occurrences(file, service).at(-1);
    return location ? toLookup(location) : { found: false };
  }

  occurrences(file: string, service: string): ServiceLocation[] {
    return [...(this.locations.get(file)?.get(service) ?? [])];
  }

  forFile(file: string): ServiceLocation[] {
    const byService = this.locations.get(file);
    if (!byService) return [];
    return [...byService.values()].flat().sort((a, b) => a.lineStart - b.lineStart);
  }
}
