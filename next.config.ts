import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // Loaded by Node at run time; the decoder inlines its wasm module.
  serverExternalPackages: ["mpg123-decoder"],
};

export default nextConfig;
