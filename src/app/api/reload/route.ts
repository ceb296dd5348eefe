import { NextResponse } from "next/server";
import { arthropodDataset } from "@/lib/arthropods/dataset";

// Re-read the CSV files after they have been replaced on disk
export async function POST() {
  arthropodDataset.invalidate();

  try {
    const { records, warnings } = await arthropodDataset.get();
    return NextResponse.json({ reloaded: true, records: records.length, warnings });
  } catch (error) {
    console.error("Error reloading dataset:", error);
    return NextResponse.json(
      { error: error instanceof Error ? error.message : "Unknown error" },
      { status: 500 }
    );
  }
}
