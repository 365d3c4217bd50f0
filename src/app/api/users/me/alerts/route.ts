import { NextRequest, NextResponse } from "next/server";
import { getAppServices } from "@/lib/services";
import { requireViewer, runRoute } from "@/lib/route-helpers";
import { toAlertJson } from "@/lib/trials/serializers";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

/**
 * Alias of GET /api/alerts/trials for profile pages
 */
export async function GET(request: NextRequest) {
  return runRoute(request, "/api/users/me/alerts", async () => {
    const viewer = await requireViewer(request);
    const alerts = await getAppServices().alerts.list(viewer.id);

    return NextResponse.json(alerts.map(toAlertJson), {
      headers: { "Cache-Control": "private, no-store" },
    });
  });
}
