import { motion } from 'framer-motion';
import { AlertTriangle, Bot, User, Zap } from 'lucide-react';
import { cn } from '@/lib/utils';
import { formatAction, formatTime } from '@/lib/format';
import type { DisplayMessage } from '@/types/chat';

export interface MessageBubbleProps {
  message: DisplayMessage;
}

/**
 * Renders a single chat message with role-specific styling, the time it was
 * added and, for assistant replies, the action the backend took.
 */
export function MessageBubble({ message }: Readonly<MessageBubbleProps>) {
  const isUser = message.role === 'user';
  const Icon = message.isError ? AlertTriangle : isUser ? User : Bot;

  return (
    <motion.div
      data-testid={`message-${message.role}`}
      initial={{ opacity: 0, y: 10 }}
      animate={{ opacity: 1, y: 0 }}
      transition={{ duration: 0.2 }}
      className={cn('flex gap-3', isUser && 'flex-row-reverse')}
    >
      <div
        className={cn(
          'flex h-8 w-8 shrink-0 items-center justify-center rounded-full',
          isUser
            ? 'bg-indigo-600 text-white'
            : message.isError
              ? 'bg-red-100 text-red-600 dark:bg-red-900/30 dark:text-red-400'
              : 'bg-indigo-100 text-indigo-600 dark:bg-indigo-900/30 dark:text-indigo-400',
        )}
      >
        <Icon className="h-4 w-4" />
      </div>

      <div
        className={cn(
          'max-w-[75%] rounded-2xl px-4 py-2 shadow-sm',
          isUser
            ? 'bg-indigo-600 text-white'
            : message.isError
              ? 'border border-red-200 bg-red-50 text-red-700 dark:border-red-800 dark:bg-red-900/20 dark:text-red-400'
              : 'bg-white text-gray-900 dark:bg-gray-800 dark:text-gray-100',
        )}
      >
        <p className="whitespace-pre-wrap break-words text-sm">
          {message.content}
        </p>

        {message.actionTaken && (
          <div className="mt-2 inline-flex items-center gap-1 rounded-full bg-emerald-100 px-2 py-0.5 text-xs font-medium text-emerald-700 dark:bg-emerald-900/30 dark:text-emerald-400">
            <Zap className="h-3 w-3" />
            Action: {formatAction(message.actionTaken)}
          </div>
        )}

        <time
          dateTime={message.timestamp.toISOString()}
          className={cn(
            'mt-1 block text-xs',
            isUser ? 'text-indigo-200' : 'text-gray-400',
          )}
        >
          {formatTime(message.timestamp)}
        </time>
      </div>
    </motion.div>
  );
}
