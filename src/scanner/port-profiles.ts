import { readFileSync } from 'fs';
import { z } from 'zod';

// Ports that get an HTTP liveness check on top of the TCP connect
export const WEB_PORTS: ReadonlySet<number> = new Set([80, 443, 8080, 8443]);

// Ports that get certificate analysis when TLS checks are enabled
export const TLS_PORTS: ReadonlySet<number> = new Set([443, 8443, 993, 995, 465, 587, 636]);

const PortListSchema = z.array(z.number().int().min(1).max(65535)).min(1);
const PortDescriptionSchema = z.record(z.string().regex(/^\d+$/), z.string().min(1));

function dataFile(name: string): URL {
  return new URL(`../../data/${name}`, import.meta.url);
}

let commonPorts: number[] | null = null;
let descriptions: Map<number, string> | null = null;

/** The `--common-ports` list, sorted and de-duplicated */
export function getCommonPorts(): number[] {
  if (!commonPorts) {
    const raw: unknown = JSON.parse(readFileSync(dataFile('common-ports.json'), 'utf8'));
    commonPorts = [...new Set(PortListSchema.parse(raw))].sort((a, b) => a - b);
  }
  return [...commonPorts];
}

export function getPortDescription(port: number): string {
  if (!descriptions) {
    const raw: unknown = JSON.parse(readFileSync(dataFile('port-descriptions.json'), 'utf8'));
    descriptions = new Map(Object.entries(PortDescriptionSchema.parse(raw)).map(([key, name]) => [Number(key), name]));
  }
  return descriptions.get(port) ?? 'Unknown';
}

export function isWebPort(port: number): boolean {
  return WEB_PORTS.has(port);
}

export function isTlsPort(port: number): boolean {
  return TLS_PORTS.has(port);
}
