import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  transpilePackages: ["@shirtsmith/contracts"],
  serverExternalPackages: ["sharp"]
};

export default nextConfig;
