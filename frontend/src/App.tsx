import { ChatPage } from './pages/ChatPage'

export function App() {
  return (
    <div className="min-h-screen bg-background">
      <ChatPage />
    </div>
  )
}
