import { format, parseISO, subDays } from "date-fns";
import { containsWholeWord, queryWindowFor, type DateWindow } from "../evidence/filters";
import type { ArchiveStore, MeetingFilter } from "../storage";
import type { CanonicalEntity } from "../query/types";

export type QueryScope = {
  workgroup: CanonicalEntity | null;
  window: DateWindow | null;
  description: string;
};

export function inclusiveEnd(window: DateWindow): string {
  return format(subDays(parseISO(window.end), 1), "yyyy-MM-dd");
}

/**
 * Workgroup whose name or alternate name appears in the text as a whole
 * word. The longest matching label wins.
 */
export function findNamedWorkgroup(text: string, workgroups: CanonicalEntity[]): CanonicalEntity | null {
  let best: { entity: CanonicalEntity; length: number } | null = null;
  for (const entity of workgroups) {
    for (const label of [entity.name, ...entity.alternateNames]) {
      const trimmed = label.trim();
      if (trimmed && containsWholeWord(text, trimmed) && (!best || trimmed.length > best.length)) {
        best = { entity, length: trimmed.length };
      }
    }
  }
  return best ? best.entity : null;
}

export function describeScope(workgroup: CanonicalEntity | null, window: DateWindow | null): string {
  const who = workgroup ? workgroup.name : "all workgroups";
  return window ? `${who} from ${window.start} to ${inclusiveEnd(window)}` : who;
}

export async function resolveQueryScope(
  question: string,
  store: Pick<ArchiveStore, "listEntities">,
  now?: Date,
): Promise<QueryScope> {
  const workgroup = findNamedWorkgroup(question, await store.listEntities("workgroup"));
  const window = queryWindowFor(question, now);
  return { workgroup, window, description: describeScope(workgroup, window) };
}

export function isScoped(scope: QueryScope): boolean {
  return scope.workgroup !== null || scope.window !== null;
}

export function meetingFilterFor(scope: QueryScope): MeetingFilter {
  return {
    workgroupId: scope.workgroup?.id,
    since: scope.window?.start,
    until: scope.window?.end,
  };
}
