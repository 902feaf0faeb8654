/**
 * Reference counts for temp artifacts that are being built or streamed. The
 * janitor consults this before deleting anything from the temp area.
 */
export class ArtifactLeases {
  private readonly counts = new Map<string, number>();
  private pendingBuilds = 0;

  acquire(artifactPath: string): () => void {
    this.counts.set(artifactPath, (this.counts.get(artifactPath) ?? 0) + 1);

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const remaining = (this.counts.get(artifactPath) ?? 1) - 1;
      if (remaining > 0) {
        this.counts.set(artifactPath, remaining);
      } else {
        this.counts.delete(artifactPath);
      }
    };
  }

  isLeased(artifactPath: string): boolean {
    return this.counts.has(artifactPath);
  }

  async trackBuild<T>(operation: () => Promise<T>): Promise<T> {
    this.pendingBuilds += 1;
    try {
      return await operation();
    } finally {
      this.pendingBuilds -= 1;
    }
  }

  get hasPendingBuilds(): boolean {
    return this.pendingBuilds > 0;
  }
}
