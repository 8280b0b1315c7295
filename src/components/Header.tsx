export function Header() {
  return (
    <header className="border-b border-amber-900/30 bg-gradient-to-r from-stone-950 via-stone-900 to-stone-950">
      <div className="mx-auto max-w-xl px-6 py-5">
        <div className="flex items-center gap-3">
          <div className="flex h-10 w-10 items-center justify-center rounded-xl bg-gradient-to-br from-amber-500 to-orange-600 shadow-lg shadow-amber-500/20">
            <svg
              className="h-6 w-6 text-stone-950"
              fill="none"
              viewBox="0 0 24 24"
              stroke="currentColor"
              strokeWidth={2}
            >
              <path
                strokeLinecap="round"
                strokeLinejoin="round"
                d="M12 18.75a6 6 0 006-6v-1.5m-6 7.5a6 6 0 01-6-6v-1.5m6 7.5v3.75m-3.75 0h7.5M12 15.75a3 3 0 01-3-3V4.5a3 3 0 116 0v8.25a3 3 0 01-3 3z"
              />
            </svg>
          </div>
          <div>
            <h1 className="font-display text-2xl font-bold tracking-tight text-amber-50">
              Recording App
            </h1>
            <p className="text-xs text-stone-500">Record, pause and stop with a live event log</p>
          </div>
        </div>
      </div>
    </header>
  )
}
