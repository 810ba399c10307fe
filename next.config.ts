import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  typescript: {
    // Type errors fail the build
    ignoreBuildErrors: false,
  },
  poweredByHeader: false,
  // Supabase pulls in optional websocket deps that webpack should not bundle
  serverExternalPackages: ['@supabase/supabase-js'],
};

export default nextConfig;
