import type { Metadata } from 'next'
import type { ReactNode } from 'react'
import { CONFIG } from '@/lib/config'
import { Providers } from './providers'
import './globals.css'

export const metadata: Metadata = {
  title: CONFIG.app.name,
  description: CONFIG.app.description,
}

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body className="bg-gray-50 dark:bg-gray-900 text-gray-900 dark:text-gray-100">
        <Providers>{children}</Providers>
      </body>
    </html>
  )
}
