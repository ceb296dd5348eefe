import { NextRequest, NextResponse } from "next/server";
import {
  DEFAULT_PAGE_SIZE,
  isRecordSortKey,
  paginate,
  sortRecords,
  type SortDirection,
} from "@/lib/arthropods/dashboard";
import { arthropodDataset } from "@/lib/arthropods/dataset";
import { applyFilters } from "@/lib/arthropods/filter";
import { parseSelectionParams } from "@/lib/arthropods/params";

export async function GET(request: NextRequest) {
  const searchParams = request.nextUrl.searchParams;
  const selection = parseSelectionParams(searchParams);
  const page = parseInt(searchParams.get("page") || "1", 10);
  const limit = parseInt(searchParams.get("limit") || String(DEFAULT_PAGE_SIZE), 10);
  const sort = searchParams.get("sort");
  const dir = searchParams.get("dir") || "asc";

  if (sort !== null && !isRecordSortKey(sort)) {
    return NextResponse.json({ error: `Unknown sort column "${sort}"` }, { status: 400 });
  }
  if (dir !== "asc" && dir !== "desc") {
    return NextResponse.json({ error: `Sort direction must be "asc" or "desc"` }, { status: 400 });
  }
  const direction: SortDirection = dir;

  try {
    const { records } = await arthropodDataset.get();
    const filtered = applyFilters(records, selection);
    const ordered = sort !== null ? sortRecords(filtered, sort, direction) : filtered;
    return NextResponse.json(paginate(ordered, page, limit));
  } catch (error) {
    console.error("Error fetching records:", error);
    return NextResponse.json(
      { error: error instanceof Error ? error.message : "Unknown error" },
      { status: 500 }
    );
  }
}
