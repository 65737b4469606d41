import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // libsql loads a platform binary; keep it out of the server bundle.
  serverExternalPackages: ["@libsql/client", "libsql"],
  async rewrites() {
    return [{ source: "/survey.html", destination: "/" }];
  },
};

export default nextConfig;
