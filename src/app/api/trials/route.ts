/**
 * Trial search
 *
 * GET /api/trials?keyword=&disease_areas=&phases=&statuses=&location=&sponsor=&page=&limit=&sort_by=
 *
 * Multi-valued filters accept repeated keys (`phases=a&phases=b`) or the
 * bracketed form (`phases[]=a`). Anonymous callers get `is_saved: false`.
 */

import { NextRequest, NextResponse } from "next/server";
import { getAppServices } from "@/lib/services";
import { logger } from "@/lib/logger";
import { optionalViewer, runRoute } from "@/lib/route-helpers";
import { filterSpecFromSearchParams } from "@/lib/trials/filter-spec";
import { toTrialPageJson } from "@/lib/trials/serializers";

// Results are viewer-specific and must be fresh
export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export async function GET(request: NextRequest) {
  return runRoute(request, "/api/trials", async () => {
    // Rejected before any query runs
    const spec = filterSpecFromSearchParams(request.nextUrl.searchParams);
    const viewer = await optionalViewer(request);

    const result = await getAppServices().search.search(spec, viewer?.id ?? null);

    await logger.debug("Trial search", {
      hasKeyword: Boolean(spec.keyword),
      sortBy: spec.sortBy,
      page: spec.page,
      total: result.total,
    });

    return NextResponse.json(toTrialPageJson(result), {
      headers: { "Cache-Control": "private, no-store" },
    });
  });
}
