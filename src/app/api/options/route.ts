import { NextResponse } from "next/server";
import { arthropodDataset } from "@/lib/arthropods/dataset";

// Options come from the cached dataset, which can be reloaded at runtime
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    return NextResponse.json(await arthropodDataset.getOptions());
  } catch (error) {
    console.error("Error loading filter options:", error);
    return NextResponse.json(
      { error: error instanceof Error ? error.message : "Unknown error" },
      { status: 500 }
    );
  }
}
