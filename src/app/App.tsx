import { Header } from '../components/Header'
import { Footer } from '../components/Footer'
import { RecorderCard } from '../components/recorder'
import { RecorderProvider } from '../domain/state'

export default function App() {
  return (
    <RecorderProvider>
      <div className="flex min-h-screen flex-col bg-stone-950 text-stone-100">
        <Header />
        <main className="flex-1 px-6 py-8">
          <div className="mx-auto max-w-xl">
            <RecorderCard />
          </div>
        </main>
        <Footer />
      </div>
    </RecorderProvider>
  )
}
