import { NextRequest, NextResponse } from "next/server";
import { buildDashboard } from "@/lib/arthropods/dashboard";
import { arthropodDataset } from "@/lib/arthropods/dataset";
import { parseSelectionParams } from "@/lib/arthropods/params";

export async function GET(request: NextRequest) {
  const selection = parseSelectionParams(request.nextUrl.searchParams);

  try {
    const { records } = await arthropodDataset.get();
    return NextResponse.json(buildDashboard(records, selection));
  } catch (error) {
    console.error("Error building dashboard:", error);
    return NextResponse.json(
      { error: error instanceof Error ? error.message : "Unknown error" },
      { status: 500 }
    );
  }
}
