import { cn } from '@/lib/utils'
import type { HTMLAttributes } from 'react'

export const Card = ({ className, ...props }: HTMLAttributes<HTMLDivElement>) => (
  <div
    {...props}
    className={cn(
      'rounded-3xl border border-white/70 bg-white/85 text-slate-900 shadow-[0_18px_45px_-32px_rgba(15,23,42,0.4)] backdrop-blur-lg',
      className,
    )}
  />
)

export const CardHeader = ({ className, ...props }: HTMLAttributes<HTMLDivElement>) => (
  <div {...props} className={cn('flex flex-col gap-1.5 p-5', className)} />
)

export const CardTitle = ({ className, ...props }: HTMLAttributes<HTMLHeadingElement>) => (
  <h3 {...props} className={cn('text-lg font-semibold leading-tight tracking-tight', className)} />
)

export const CardDescription = ({ className, ...props }: HTMLAttributes<HTMLParagraphElement>) => (
  <p {...props} className={cn('text-sm text-slate-500', className)} />
)

export const CardContent = ({ className, ...props }: HTMLAttributes<HTMLDivElement>) => (
  <div {...props} className={cn('p-5 pt-0', className)} />
)
