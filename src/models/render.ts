// Rendering statistics

/**
 * Outcome counters of one rendering run
 */
export interface RenderStats {
  filesCreated: number;
  directoriesCreated: number;
  filesSkipped: number;
  filesOverwritten: number;
  /** Per-file failures, in the order they happened */
  errors: string[];
}

export function emptyRenderStats(): RenderStats {
  return {
    filesCreated: 0,
    directoriesCreated: 0,
    filesSkipped: 0,
    filesOverwritten: 0,
    errors: []
  };
}

export function copyRenderStats(stats: RenderStats): RenderStats {
  return { ...stats, errors: [...stats.errors] };
}
