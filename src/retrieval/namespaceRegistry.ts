import { NamespaceNotFoundError } from '../errors';
import type { Namespace } from '../calls/types';

/** Namespace-keyed handles (indexes, credentials). Lookups never fall back across namespaces. */
export class NamespaceRegistry<T> {
  private readonly entries = new Map<Namespace, T>();

  public register(namespace: Namespace, handle: T): void {
    this.entries.set(namespace, handle);
  }

  public unregister(namespace: Namespace): boolean {
    return this.entries.delete(namespace);
  }

  public has(namespace: Namespace): boolean {
    return this.entries.has(namespace);
  }

  public get(namespace: Namespace): T | undefined {
    return this.entries.get(namespace);
  }

  public resolve(namespace: Namespace): T {
    const handle = this.entries.get(namespace);
    if (handle === undefined) {
      throw new NamespaceNotFoundError(namespace);
    }
    return handle;
  }

  public namespaces(): Namespace[] {
    return Array.from(this.entries.keys()).sort();
  }
}
