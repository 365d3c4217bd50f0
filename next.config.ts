import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // node-postgres uses Node built-ins and optional native bindings
  serverExternalPackages: ["pg"],

  // JSON API only: lock responses down
  async headers() {
    return [
      {
        source: "/api/(.*)",
        headers: [
          {
            key: "Content-Security-Policy",
            value: "default-src 'none'; frame-ancestors 'none'",
          },
          {
            key: "X-Content-Type-Options",
            value: "nosniff",
          },
          {
            key: "Referrer-Policy",
            value: "no-referrer",
          },
          {
            key: "Strict-Transport-Security",
            value: "max-age=31536000; includeSubDomains; preload",
          },
        ],
      },
    ];
  },

  // Disable powered by header
  poweredByHeader: false,
};

export default nextConfig;
