import { ChatWindow } from '@/components/chat/chat-window'

function App() {
  return (
    <main className="flex h-screen items-center justify-center bg-gradient-to-br from-indigo-500 to-purple-600 p-4">
      <ChatWindow />
    </main>
  )
}

export default App
