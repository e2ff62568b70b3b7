import { motion } from 'framer-motion';
import { Bot } from 'lucide-react';
import { cn } from '@/lib/utils';

export interface TypingIndicatorProps {
  message?: string;
  className?: string;
}

/**
 * Animated typing indicator with bouncing dots, shown while the backend
 * works on a reply.
 */
export function TypingIndicator({
  message = 'Thinking...',
  className,
}: Readonly<TypingIndicatorProps>) {
  return (
    <motion.div
      role="status"
      aria-label="Assistant is typing"
      initial={{ opacity: 0, y: 10 }}
      animate={{ opacity: 1, y: 0 }}
      exit={{ opacity: 0, y: -10 }}
      transition={{ duration: 0.2 }}
      className={cn('flex items-center gap-3 py-2', className)}
    >
      <div className="flex h-8 w-8 items-center justify-center rounded-full bg-indigo-100 text-indigo-600 dark:bg-indigo-900/30 dark:text-indigo-400">
        <Bot className="h-4 w-4" />
      </div>

      <div className="flex items-center gap-1.5">
        <span className="text-sm text-gray-500">{message}</span>
        <div className="flex gap-1">
          {[0, 1, 2].map((i) => (
            <motion.span
              key={i}
              animate={{
                y: [0, -4, 0],
                opacity: [0.4, 1, 0.4],
              }}
              transition={{
                duration: 0.6,
                repeat: Infinity,
                delay: i * 0.15,
                ease: 'easeInOut',
              }}
              className="h-1.5 w-1.5 rounded-full bg-indigo-500 dark:bg-indigo-400"
            />
          ))}
        </div>
      </div>
    </motion.div>
  );
}
