import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  turbopack: {
    // Pin Turbopack root to this checkout so nested worktrees don't conflict.
    root: __dirname,
  },
  // googleapis is large and only used by route handlers.
  serverExternalPackages: ["googleapis"],
};

export default nextConfig;
