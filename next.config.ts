import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // The CSV files under data/ are read at runtime by the API routes
  outputFileTracingIncludes: {
    "/api/**/*": ["./data/**/*"],
  },
};

export default nextConfig;
