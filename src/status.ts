import type { GitClient } from "./git";
import type { MirrorStore } from "./mirror";
import type { TargetCloneManager } from "./target";
import type { MirrorState, TargetCloneState } from "./types";

export interface SyncStatus {
  mirror: MirrorState;
  target: TargetCloneState;
  relation: "in-sync" | "behind" | "diverged" | "unknown";
}

export async function getStatus(
  mirror: MirrorStore,
  target: TargetCloneManager,
  git: GitClient
): Promise<SyncStatus> {
  const mirrorState = await mirror.inspect();
  const targetState = await target.inspect();

  if (!mirrorState.head || !targetState.head) {
    return { mirror: mirrorState, target: targetState, relation: "unknown" };
  }
  if (mirrorState.head === targetState.head) {
    return { mirror: mirrorState, target: targetState, relation: "in-sync" };
  }
  // Only the mirror is guaranteed to hold both commits when the target is behind.
  const behind = await git.isAncestor(mirrorState.path, targetState.head, mirrorState.head);
  return { mirror: mirrorState, target: targetState, relation: behind ? "behind" : "diverged" };
}

export function formatStatus(status: SyncStatus): string[] {
  const { mirror, target } = status;
  const lines = [`mirror: ${mirror.path}`];
  if (!mirror.exists) {
    lines.push("  missing");
  } else {
    lines.push(`  head: ${mirror.head ?? "(branch missing)"}`);
    const fetchedAt = mirror.lastFetchTime ? mirror.lastFetchTime.toISOString() : "never";
    lines.push(`  last fetch: ${fetchedAt}`);
  }
  lines.push(`target: ${target.path}`);
  if (!target.exists) {
    lines.push("  missing");
  } else if (!target.isValidClone) {
    lines.push("  not a git clone");
  } else {
    lines.push(`  branch: ${target.branch ?? "(detached)"}`);
    lines.push(`  head: ${target.head ?? "(unborn)"}`);
    lines.push(`  origin: ${target.origin ?? "(unset)"}`);
    lines.push(`  worktree: ${target.clean ? "clean" : "dirty"}`);
  }
  lines.push(`relation: ${status.relation}`);
  return lines;
}
