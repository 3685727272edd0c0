export interface HubbleFilterInput {
  src?: string;
  dst?: string;
  verdict?: string;
}

export interface HubbleFilters {
  /** Ready-to-run `hubble observe` command line */
  cli: string;
  filters: {
    from: string | null;
    to: string | null;
    verdict: string | null;
  };
}

/**
 * Build `hubble observe` flags and the matching filter object for a flow
 * query. Empty fields are omitted from the command and null in the filters.
 */
export function buildHubbleFilters(input: HubbleFilterInput = {}): HubbleFilters {
  const { src = "", dst = "", verdict = "" } = input;
  const args: string[] = [];
  if (src) args.push("--from", src);
  if (dst) args.push("--to", dst);
  if (verdict) args.push("--verdict", verdict);

  return {
    cli: `hubble observe ${args.join(" ")}`,
    filters: {
      from: src || null,
      to: dst || null,
      verdict: verdict || null,
    },
  };
}
