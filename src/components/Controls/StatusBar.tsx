import { useEffect, useState } from 'react';
import { AnimatePresence, motion } from 'framer-motion';
import type { StatusMessage } from '../../types/paper';

export const SUCCESS_HIDE_MS = 3000;

const statusStyles = {
  info: 'bg-blue-500/10 border-blue-500/30 text-blue-300',
  success: 'bg-emerald-500/10 border-emerald-500/30 text-emerald-300',
  error: 'bg-red-500/10 border-red-500/30 text-red-300',
};

interface StatusBarProps {
  status: StatusMessage | null;
}

export function StatusBar({ status }: StatusBarProps) {
  const [hiddenId, setHiddenId] = useState<number | null>(null);

  useEffect(() => {
    if (!status || status.type !== 'success') return;
    const t = setTimeout(() => setHiddenId(status.id), SUCCESS_HIDE_MS);
    return () => clearTimeout(t);
  }, [status]);

  return (
    <AnimatePresence>
      {status && status.id !== hiddenId && (
        <motion.div
          key={status.id}
          initial={{ opacity: 0, y: 10 }}
          animate={{ opacity: 1, y: 0 }}
          exit={{ opacity: 0 }}
          role="status"
          className={`border rounded-lg px-3 py-1.5 text-sm ${statusStyles[status.type]}`}
        >
          {status.text}
        </motion.div>
      )}
    </AnimatePresence>
  );
}
