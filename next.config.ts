import withBundleAnalyzer from "@next/bundle-analyzer";
import type { NextConfig } from "next";

import { buildLog } from "./utils/buildLog";

const isAnalyze = process.env.ANALYZE === "true";

buildLog("next.config loaded");

// API-only deployment: route handlers under app/ and no pages.
const nextConfig: NextConfig = {
  poweredByHeader: false,
  serverExternalPackages: ["openai"],
};

export default withBundleAnalyzer({
  enabled: isAnalyze,
})(nextConfig);
