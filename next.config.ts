import type { NextConfig } from 'next'

// Static export: the page is served from plain file hosting next to public/data.
const nextConfig: NextConfig = {
  output: 'export',
  trailingSlash: true,
  images: { unoptimized: true },
}

export default nextConfig
