import type { ReactNode } from 'react'
import type { Notice } from '../types'

interface NoticeBannerProps {
  notice: Notice
  children?: ReactNode
}

export default function NoticeBanner({ notice, children }: NoticeBannerProps) {
  return (
    <div className={`notice notice-${notice.level}`} role={notice.level === 'info' ? 'status' : 'alert'}>
      <span>{notice.message}</span>
      {children}
    </div>
  )
}
