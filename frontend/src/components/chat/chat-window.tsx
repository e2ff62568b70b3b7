import { useEffect, useRef } from 'react';
import { AnimatePresence } from 'framer-motion';
import { ShieldCheck } from 'lucide-react';
import { useSupportChat } from '@/hooks/use-support-chat';
import { ChatInput } from './chat-input';
import { MessageBubble } from './message-bubble';
import { TypingIndicator } from './typing-indicator';

/**
 * The whole chat: header, scrolling message list and input.
 */
export function ChatWindow() {
  const { messages, isLoading, sendMessage } = useSupportChat();
  const endRef = useRef<HTMLDivElement>(null);

  // Keep the latest message in view
  useEffect(() => {
    endRef.current?.scrollIntoView({ behavior: 'smooth' });
  }, [messages, isLoading]);

  return (
    <div className="flex h-full w-full max-w-3xl flex-col overflow-hidden rounded-2xl bg-gray-50 shadow-xl dark:bg-gray-900">
      <header className="flex items-center gap-3 bg-indigo-600 px-6 py-4 text-white">
        <ShieldCheck className="h-8 w-8" />
        <div>
          <h1 className="text-lg font-semibold">Access Support Bot</h1>
          <p className="text-sm text-indigo-100">Automated L1 Support Assistant</p>
        </div>
      </header>

      <div className="flex-1 space-y-4 overflow-y-auto p-6" aria-live="polite">
        {messages.map((message) => (
          <MessageBubble key={message.id} message={message} />
        ))}

        <AnimatePresence>{isLoading && <TypingIndicator />}</AnimatePresence>

        <div ref={endRef} />
      </div>

      <ChatInput
        disabled={isLoading}
        onSend={(text) => {
          void sendMessage(text);
        }}
      />
    </div>
  );
}
