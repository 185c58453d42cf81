import { toast } from 'sonner';

export interface Notifier {
  // `key` collapses repeated notifications of the same failure into one toast.
  error(message: string, key?: string): void;
}

export const toastNotifier: Notifier = {
  error: (message, key) => {
    toast.error(message, key ? { id: key } : undefined);
  },
};
