import type { ReactNode } from 'react'

interface ChartContainerProps {
  title?: string
  caption?: string
  children: ReactNode
}

export function ChartContainer({ title, caption, children }: ChartContainerProps) {
  return (
    <div className="chart-container">
      {title && <h4 className="text-sm font-medium text-gray-700 dark:text-gray-300 mb-2">{title}</h4>}
      <div className="bg-white dark:bg-gray-800 rounded-md p-2">{children}</div>
      {caption && <p className="text-xs text-gray-500 dark:text-gray-400 mt-1">{caption}</p>}
    </div>
  )
}
