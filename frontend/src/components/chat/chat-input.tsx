import { useState, type FormEvent } from 'react';
import { Loader2, Send } from 'lucide-react';
import { cn } from '@/lib/utils';

export interface ChatInputProps {
  onSend: (text: string) => void;
  disabled?: boolean;
}

export const INPUT_PLACEHOLDER =
  "Type your message... (e.g., 'My access request was approved but I didn't get access')";

export function ChatInput({ onSend, disabled = false }: Readonly<ChatInputProps>) {
  const [value, setValue] = useState('');
  const canSend = !disabled && value.trim().length > 0;

  const handleSubmit = (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    if (!canSend) return;
    onSend(value);
    setValue('');
  };

  return (
    <form
      onSubmit={handleSubmit}
      className="flex items-center gap-2 border-t border-gray-200 p-4 dark:border-gray-700"
    >
      <input
        type="text"
        value={value}
        onChange={(e) => setValue(e.target.value)}
        placeholder={INPUT_PLACEHOLDER}
        disabled={disabled}
        aria-label="Message"
        className="flex-1 rounded-full border border-gray-300 bg-white px-4 py-2 text-sm focus:outline-none focus:ring-2 focus:ring-indigo-500 disabled:opacity-60 dark:border-gray-600 dark:bg-gray-800"
      />
      <button
        type="submit"
        disabled={!canSend}
        aria-label="Send message"
        className={cn(
          'flex h-10 w-10 items-center justify-center rounded-full bg-indigo-600 text-white transition-colors hover:bg-indigo-700',
          'disabled:cursor-not-allowed disabled:opacity-50',
        )}
      >
        {disabled ? (
          <Loader2 className="h-4 w-4 animate-spin" />
        ) : (
          <Send className="h-4 w-4" />
        )}
      </button>
    </form>
  );
}
