/**
 * Token screen tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { render, screen, fireEvent } from '@testing-library/react';

vi.mock('@/lib/debug-logger', () => ({
  debugLog: vi.fn(),
  debugError: vi.fn(),
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { createPushServices } from '@/providers/createPushServices';
import { PushProvider } from '@/providers/PushProvider';
import { FakeMessagingProvider } from '@/test/fakeMessagingProvider';
import TokenPage from './page';

const settings = { bannerTimeoutMs: 5000, maxVisibleBanners: 3, platformTokenRetryMs: 3000 };

describe('TokenPage', () => {
  const mockWriteText = vi.fn();
  let provider: FakeMessagingProvider;

  beforeEach(() => {
    Object.defineProperty(navigator, 'clipboard', {
      value: { writeText: mockWriteText },
      writable: true,
      configurable: true,
    });
    mockWriteText.mockResolvedValue(undefined);
    provider = new FakeMessagingProvider();
    provider.token = 'abc123';
  });

  function renderPage() {
    const services = createPushServices({ provider, settings });
    render(
      <PushProvider services={services}>
        <TokenPage />
      </PushProvider>
    );
    return services;
  }

  it('shows the full registration token once initialized', async () => {
    renderPage();

    await screen.findByText('abc123');

    expect(screen.getByTestId('token-value')).toHaveTextContent('abc123');
    expect(screen.getByText('Status: Active')).toBeInTheDocument();
    expect(screen.getByText('Permission: Granted')).toBeInTheDocument();
  });

  it('copies the exact token and confirms with a toast', async () => {
    renderPage();
    await screen.findByText('abc123');

    fireEvent.click(screen.getByRole('button', { name: 'Copy Token' }));

    expect(await screen.findByText('Token copied to clipboard')).toBeInTheDocument();
    expect(mockWriteText).toHaveBeenCalledTimes(1);
    expect(mockWriteText).toHaveBeenCalledWith('abc123');
  });

  it('fetches a new token on refresh', async () => {
    renderPage();
    await screen.findByText('abc123');
    provider.token = 'def456';

    fireEvent.click(screen.getByRole('button', { name: 'Refresh Token' }));

    expect(await screen.findByText('Token refreshed')).toBeInTheDocument();
    expect(screen.getByTestId('token-value')).toHaveTextContent('def456');
  });

  it('shows the missing token when permission is denied', async () => {
    provider.permission = 'denied';
    renderPage();

    expect(await screen.findByText('Status: Not receiving')).toBeInTheDocument();
    expect(screen.getByText('Permission: Denied')).toBeInTheDocument();
    expect(screen.getByTestId('token-value')).toHaveTextContent('No token available');
    expect(screen.getByRole('button', { name: 'Copy Token' })).toBeDisabled();
    expect(provider.getToken).not.toHaveBeenCalled();
  });
});
