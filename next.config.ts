import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  serverExternalPackages: ["csv-parse"],
};

export default nextConfig;
