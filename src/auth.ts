import NextAuth from 'next-auth';
import Credentials from 'next-auth/providers/credentials';
import { authorizeAccessCode } from '@/lib/access-codes';
import { getConfig } from '@/lib/config';

export const ACCESS_CODE_PROVIDER = 'access-code';

// Config is read per request so a build without secrets still succeeds.
export const { handlers, auth, signIn, signOut } = NextAuth(() => {
  const config = getConfig();
  return {
    secret: config.AUTH_SECRET,
    trustHost: true,
    session: {
      strategy: 'jwt',
      maxAge: Math.floor(config.PRO_SESSION_TTL_HOURS * 60 * 60),
    },
    pages: { signIn: '/' },
    providers: [
      Credentials({
        id: ACCESS_CODE_PROVIDER,
        name: 'Access code',
        credentials: {
          code: { label: 'Access code', type: 'text' },
        },
        authorize: credentials => authorizeAccessCode(credentials),
      }),
    ],
  };
});
