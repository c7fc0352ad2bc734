import { cn } from '@/lib/utils'
import type { ButtonHTMLAttributes } from 'react'

export interface ButtonProps extends ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: 'default' | 'outline'
  size?: 'default' | 'sm'
}

export const Button = ({
  className,
  variant = 'default',
  size = 'default',
  type = 'button',
  ...props
}: ButtonProps) => (
  <button
    {...props}
    type={type}
    className={cn(
      'inline-flex items-center justify-center gap-2 rounded-full font-semibold transition disabled:pointer-events-none disabled:opacity-50',
      variant === 'default'
        ? 'bg-slate-900 text-white shadow hover:bg-slate-800'
        : 'border border-slate-300/80 bg-white/80 text-slate-600 hover:border-slate-400 hover:text-slate-800',
      size === 'default' ? 'h-10 px-5 text-sm' : 'h-8 px-3 text-xs',
      className,
    )}
  />
)

export default Button
