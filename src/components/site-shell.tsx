'use client';

import Link from 'next/link';
import { usePathname } from 'next/navigation';
import type { ReactNode } from 'react';
import { signOut, useSession } from 'next-auth/react';
import { BarChart3, LogOut, Sparkles } from 'lucide-react';

const NAV_LINKS = [
  { href: '/pro', label: 'Full Analysis', icon: Sparkles },
  { href: '/dashboard', label: 'Progress', icon: BarChart3 },
];

function Nav() {
  const pathname = usePathname();
  const { data: session } = useSession();
  const email = session?.user?.email;

  return (
    <nav
      className="sticky top-0 z-50 backdrop-blur-xl border-b border-border"
      style={{ backgroundColor: 'var(--nav-bg)' }}
    >
      <div className="max-w-6xl mx-auto px-6 flex items-center justify-between h-16">
        <Link href="/" className="flex items-center gap-3">
          <div className="w-8 h-8 rounded-lg bg-gradient-to-br from-accent to-accent-light flex items-center justify-center">
            <svg width="16" height="16" viewBox="0 0 16 16" fill="none" xmlns="http://www.w3.org/2000/svg">
              <circle cx="8" cy="8" r="2" fill="white" />
              <path d="M4.5 4.5a5 5 0 0 0 0 7M11.5 4.5a5 5 0 0 1 0 7" stroke="white" strokeWidth="1.5" strokeLinecap="round" opacity="0.75" />
            </svg>
          </div>
          <span className="text-base font-bold tracking-tight">SignalScore</span>
        </Link>
        <div className="flex items-center gap-2 text-sm">
          {NAV_LINKS.map(({ href, label, icon: Icon }) => {
            const active = pathname.startsWith(href);
            return (
              <Link
                key={href}
                href={href}
                className={`hidden sm:flex items-center gap-1.5 px-3.5 py-1.5 rounded-lg font-medium text-[13px] transition-all ${
                  active
                    ? 'bg-accent text-white hover:bg-accent-light'
                    : 'bg-bg-card border border-border text-text-secondary hover:text-text hover:bg-bg-elevated'
                }`}
              >
                <Icon size={14} />
                {label}
              </Link>
            );
          })}
          {email && (
            <div className="flex items-center gap-2 pl-2 ml-1 border-l border-border">
              <span className="text-[9px] font-bold px-2 py-0.5 rounded-full uppercase tracking-widest bg-accent/10 text-accent-light">Pro</span>
              <span className="hidden md:inline text-xs text-text-secondary max-w-40 truncate">{email}</span>
              <button
                onClick={() => void signOut({ callbackUrl: '/' })}
                title="Sign out"
                className="p-1.5 rounded-lg text-text-muted hover:text-text hover:bg-bg-elevated transition-all cursor-pointer"
              >
                <LogOut size={14} />
              </button>
            </div>
          )}
        </div>
      </div>
    </nav>
  );
}

export function SiteShell({ children }: { children: ReactNode }) {
  return (
    <div className="min-h-screen flex flex-col">
      <Nav />
      <div className="flex-1 flex flex-col">{children}</div>
      <footer className="mt-auto border-t border-border py-8 text-center">
        <p className="text-xs text-text-muted">
          &copy; {new Date().getFullYear()} SignalScore. Scores reflect on-page signals at scan time.
        </p>
      </footer>
    </div>
  );
}
