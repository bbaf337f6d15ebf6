import crypto from 'node:crypto';

/**
 * State that lives for exactly one run: container expansions and the run id used in
 * events and logs. Never shared between runs, so an expansion in one conversation
 * cannot leak into another.
 */
export class RunScope {
  readonly runId: string;
  readonly conversationId?: string;
  private readonly expanded = new Set<string>();

  constructor(options: { runId?: string; conversationId?: string } = {}) {
    this.runId = options.runId ?? crypto.randomUUID();
    this.conversationId = options.conversationId;
  }

  expand(container: string): void {
    this.expanded.add(container);
  }

  isExpanded(container: string): boolean {
    return this.expanded.has(container);
  }

  expandedContainers(): string[] {
    return [...this.expanded];
  }
}
