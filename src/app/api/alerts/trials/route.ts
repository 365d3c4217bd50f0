/**
 * Trial alert subscriptions owned by the caller
 *
 * POST /api/alerts/trials  create (201)
 * GET  /api/alerts/trials  list, newest first
 */

import { NextRequest, NextResponse } from "next/server";
import { getAppServices } from "@/lib/services";
import { readJsonBody, requireViewer, runRoute } from "@/lib/route-helpers";
import { parseNewAlert } from "@/lib/schemas";
import { toAlertJson } from "@/lib/trials/serializers";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export async function POST(request: NextRequest) {
  return runRoute(request, "/api/alerts/trials", async () => {
    const viewer = await requireViewer(request);
    const alert = parseNewAlert(await readJsonBody(request));

    const created = await getAppServices().alerts.create(viewer.id, alert);

    return NextResponse.json(toAlertJson(created), { status: 201 });
  });
}

export async function GET(request: NextRequest) {
  return runRoute(request, "/api/alerts/trials", async () => {
    const viewer = await requireViewer(request);
    const alerts = await getAppServices().alerts.list(viewer.id);

    return NextResponse.json(alerts.map(toAlertJson), {
      headers: { "Cache-Control": "private, no-store" },
    });
  });
}
