import { randomUUID } from "crypto";

export interface ToolInstanceRecord {
  id: string;
  createdAt: Date;
  groundTruth?: string;
}

/**
 * Per-tool bookkeeping of live instance ids. Mutated only between awaits,
 * so concurrent episodes on the event loop need no lock.
 */
export class InstanceStore {
  private readonly instances = new Map<string, ToolInstanceRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  create(instanceId?: string, groundTruth?: string): ToolInstanceRecord {
    const id = instanceId ?? randomUUID();
    const record: ToolInstanceRecord = { id, createdAt: this.now() };
    if (groundTruth !== undefined) record.groundTruth = groundTruth;
    this.instances.set(id, record);
    return record;
  }

  get(instanceId: string): ToolInstanceRecord | undefined {
    return this.instances.get(instanceId);
  }

  has(instanceId: string): boolean {
    return this.instances.has(instanceId);
  }

  release(instanceId: string): boolean {
    return this.instances.delete(instanceId);
  }

  get size(): number {
    return this.instances.size;
  }
}
