/**
 * Unit tests for SystemToast component
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { render, screen, fireEvent, act } from '@testing-library/react';
import { useBannerStore } from '@/stores';
import { SystemToast, SystemToastContainer, SystemToastHost } from './SystemToast';

describe('SystemToast', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('renders the message as an alert', () => {
    render(<SystemToast id="toast-1" message="Token copied to clipboard" onDismiss={vi.fn()} />);

    expect(screen.getByRole('alert')).toHaveTextContent('Token copied to clipboard');
  });

  it('calls onDismiss when the dismiss button is clicked', () => {
    const onDismiss = vi.fn();
    render(<SystemToast id="toast-1" message="Token refreshed" onDismiss={onDismiss} />);

    fireEvent.click(screen.getByRole('button', { name: 'Dismiss message' }));

    expect(onDismiss).toHaveBeenCalledWith('toast-1');
  });

  it('auto-dismisses after the default 2 seconds', () => {
    const onDismiss = vi.fn();
    render(<SystemToast id="toast-1" message="Token refreshed" onDismiss={onDismiss} />);

    act(() => {
      vi.advanceTimersByTime(1999);
    });
    expect(onDismiss).not.toHaveBeenCalled();

    act(() => {
      vi.advanceTimersByTime(1);
    });
    expect(onDismiss).toHaveBeenCalledTimes(1);
    expect(onDismiss).toHaveBeenCalledWith('toast-1');
  });

  it('auto-dismisses after a custom timeout', () => {
    const onDismiss = vi.fn();
    render(<SystemToast id="toast-1" message="Token refreshed" onDismiss={onDismiss} autoDismissMs={500} />);

    act(() => {
      vi.advanceTimersByTime(500);
    });

    expect(onDismiss).toHaveBeenCalledTimes(1);
  });
});

describe('SystemToastContainer', () => {
  it('renders nothing without toasts', () => {
    const { container } = render(<SystemToastContainer toasts={[]} onDismiss={vi.fn()} />);

    expect(container.firstChild).toBeNull();
  });

  it('calls onDismiss with the toast id', () => {
    const onDismiss = vi.fn();
    render(
      <SystemToastContainer
        toasts={[
          { id: 'toast-a', message: 'First' },
          { id: 'toast-b', message: 'Second' },
        ]}
        onDismiss={onDismiss}
      />
    );

    fireEvent.click(screen.getAllByRole('button', { name: 'Dismiss message' })[1]);

    expect(onDismiss).toHaveBeenCalledWith('toast-b');
  });
});

describe('SystemToastHost', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('shows store toasts and removes them after their duration', () => {
    render(<SystemToastHost />);

    act(() => {
      useBannerStore.getState().pushToast('Token copied to clipboard');
    });
    expect(screen.getByText('Token copied to clipboard')).toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(2000);
    });
    expect(screen.queryByText('Token copied to clipboard')).not.toBeInTheDocument();
    expect(useBannerStore.getState().toasts).toHaveLength(0);
  });

  it('keeps the first toast on its own schedule when another arrives', () => {
    render(<SystemToastHost />);

    act(() => {
      useBannerStore.getState().pushToast('Token copied to clipboard');
    });
    act(() => {
      vi.advanceTimersByTime(1500);
    });
    act(() => {
      useBannerStore.getState().pushToast('Token refreshed');
    });
    act(() => {
      vi.advanceTimersByTime(500);
    });

    expect(screen.queryByText('Token copied to clipboard')).not.toBeInTheDocument();
    expect(screen.getByText('Token refreshed')).toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(1500);
    });
    expect(screen.queryByText('Token refreshed')).not.toBeInTheDocument();
  });
});
