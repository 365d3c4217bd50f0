import { NextRequest, NextResponse } from "next/server";
import { getAppServices } from "@/lib/services";
import { requireViewer, runRoute } from "@/lib/route-helpers";
import { toSavedTrialJson } from "@/lib/trials/serializers";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

/**
 * The viewer's saved trials, most recently saved first
 */
export async function GET(request: NextRequest) {
  return runRoute(request, "/api/users/me/saved-trials", async () => {
    const viewer = await requireViewer(request);
    const saved = await getAppServices().savedTrials.listSaved(viewer.id);

    return NextResponse.json(saved.map(toSavedTrialJson), {
      headers: { "Cache-Control": "private, no-store" },
    });
  });
}
