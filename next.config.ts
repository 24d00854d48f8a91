import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  serverExternalPackages: ['nodemailer'],
};

export default nextConfig;
