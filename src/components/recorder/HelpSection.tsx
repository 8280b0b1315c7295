import { useState, type ReactNode } from 'react'

export function HelpSection() {
  const [isHelpOpen, setIsHelpOpen] = useState(false)

  return (
    <div className="mt-4 border-t border-stone-800 pt-3 sm:mt-6 sm:pt-4">
      <button
        onClick={() => setIsHelpOpen(!isHelpOpen)}
        className="flex w-full cursor-pointer items-center justify-center gap-1.5 text-[11px] text-stone-500 transition-colors hover:text-stone-400 sm:gap-2 sm:text-xs"
      >
        <span>How interruptions work</span>
        <svg
          className={`h-2.5 w-2.5 transition-transform sm:h-3 sm:w-3 ${isHelpOpen ? 'rotate-180' : ''}`}
          fill="none"
          viewBox="0 0 24 24"
          stroke="currentColor"
          strokeWidth={2}
        >
          <path strokeLinecap="round" strokeLinejoin="round" d="M19 9l-7 7-7-7" />
        </svg>
      </button>

      {isHelpOpen && (
        <div className="mt-2 space-y-1.5 text-[11px] text-stone-500 sm:mt-3 sm:space-y-2 sm:text-xs">
          <HelpTip text="A call or another app taking the microphone pauses the recording." />
          <HelpTip text="When the microphone comes back, recording resumes on its own." />
          <HelpTip text="A pause you make yourself is never resumed automatically." />
        </div>
      )}
    </div>
  )
}

function HelpTip({ text }: { text: ReactNode }) {
  return (
    <div className="rounded-lg bg-stone-900/50 p-2.5 sm:p-3">
      <p>{text}</p>
    </div>
  )
}
