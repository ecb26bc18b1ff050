/**
 * Presentation Dispatcher
 *
 * Renders a transient banner for a message that arrives while the app is
 * in the foreground, without taking over the current screen.
 *
 * The dispatcher never reaches for the UI on its own: the React shell
 * registers an accessor for the current presentation root at startup
 * (see PushProvider). When no root is registered the message is dropped.
 *
 * Banners stack: every message gets its own banner, newest on top. Once
 * more than `maxVisibleBanners` are visible the oldest is removed.
 */

import { createLogger, type Logger } from '@/lib/debug-logger';
import { DEFAULT_PUSH_SETTINGS } from './config';
import { describeMessage, hasDisplayContent } from './message';
import { fail, ok } from './result';
import type { InboundMessage, PushResult, Unsubscribe } from './types';

export interface BannerContent {
  title: string;
  body: string;
  imageUrl?: string;
}

/** What the UI layer receives for each banner. */
export interface BannerEntry extends BannerContent {
  id: string;
  onTap: () => void;
  onClose: () => void;
}

/** Topmost visual layer the banners are inserted into. */
export interface OverlayLayer {
  insert(entry: BannerEntry): void;
  remove(id: string): void;
}

/**
 * The active screen, as seen by the dispatcher.
 */
export interface PresentationRoot {
  /** Null while the overlay layer is not mounted yet */
  getOverlay(): OverlayLayer | null;
  /** Modal fallback anchored to the top of the screen */
  showDialog(entry: BannerEntry): void;
  closeDialog(id: string): void;
  showToast(text: string): void;
}

export type RootAccessor = () => PresentationRoot | null;

export type BannerPresentation = 'overlay' | 'dialog';

export interface BannerHandle {
  readonly id: string;
  readonly message: InboundMessage;
  readonly presentation: BannerPresentation;
  isMounted(): boolean;
  /** Runs the tap action, then removes the banner. False if already removed. */
  tap(): boolean;
  /** Removes the banner. False if already removed. */
  dismiss(): boolean;
}

export interface PresentationDispatcherOptions {
  autoDismissMs?: number;
  maxVisibleBanners?: number;
  /** Action for a tap on a banner; navigation is up to the application */
  onBannerTap?: (message: InboundMessage) => void;
  logger?: Logger;
}

export const DEFAULT_BANNER_TITLE = 'Notification';

export function toBannerContent(message: InboundMessage): BannerContent {
  const notification = message.notification;
  const content: BannerContent = {
    title: notification?.title || DEFAULT_BANNER_TITLE,
    body: notification?.body ?? '',
  };
  if (notification?.imageUrl) {
    content.imageUrl = notification.imageUrl;
  }
  return content;
}

export class PresentationDispatcher {
  private readonly autoDismissMs: number;
  private readonly maxVisibleBanners: number;
  private readonly onBannerTap: ((message: InboundMessage) => void) | undefined;
  private readonly log: Logger;
  private rootAccessor: RootAccessor | null = null;
  private readonly visible: BannerHandle[] = [];
  private sequence = 0;

  constructor(options: PresentationDispatcherOptions = {}) {
    this.autoDismissMs = options.autoDismissMs ?? DEFAULT_PUSH_SETTINGS.bannerTimeoutMs;
    this.maxVisibleBanners = Math.max(1, options.maxVisibleBanners ?? DEFAULT_PUSH_SETTINGS.maxVisibleBanners);
    this.onBannerTap = options.onBannerTap;
    this.log = options.logger ?? createLogger('[PresentationDispatcher]');
  }

  /**
   * Register the accessor for the current presentation root.
   * The returned function unregisters it, unless another accessor has
   * replaced it in the meantime.
   */
  setRootProvider(accessor: RootAccessor): Unsubscribe {
    this.rootAccessor = accessor;
    return () => {
      if (this.rootAccessor === accessor) {
        this.rootAccessor = null;
      }
    };
  }

  /** Banners currently on screen, oldest first. */
  getVisibleBanners(): readonly BannerHandle[] {
    return [...this.visible];
  }

  showBanner(message: InboundMessage): PushResult<BannerHandle> {
    const root = this.resolveRoot();
    if (!root) {
      this.log.warn('No presentation root, dropping message', message.messageId);
      return fail('context-unavailable', 'No presentation root is registered');
    }

    if (!hasDisplayContent(message)) {
      this.log.debug('Message has no title or body, nothing to show', message.messageId);
      return fail('no-content', 'Message has no notification title or body');
    }

    const content = toBannerContent(message);

    let overlay: OverlayLayer | null = null;
    try {
      overlay = root.getOverlay();
    } catch (error) {
      this.log.warn('Overlay lookup failed:', error);
    }

    if (overlay) {
      const layer = overlay;
      const { handle, entry } = this.createBanner(message, content, 'overlay', (id) => layer.remove(id));
      try {
        layer.insert(entry);
        this.track(handle);
        this.log.debug('Banner inserted', describeMessage(message));
        return ok(handle);
      } catch (error) {
        this.log.warn('Overlay insert failed, falling back to dialog:', error);
        handle.dismiss();
      }
    }

    return this.presentDialog(root, message, content);
  }

  /**
   * Show a short confirmation toast ("Token copied to clipboard").
   */
  showToast(text: string): PushResult<void> {
    const root = this.resolveRoot();
    if (!root) {
      this.log.warn('No presentation root, dropping toast');
      return fail('context-unavailable', 'No presentation root is registered');
    }
    try {
      root.showToast(text);
      return ok(undefined);
    } catch (error) {
      this.log.error('Failed to show toast:', error);
      return fail('context-unavailable', 'Toast could not be shown', error);
    }
  }

  private presentDialog(
    root: PresentationRoot,
    message: InboundMessage,
    content: BannerContent
  ): PushResult<BannerHandle> {
    const { handle, entry } = this.createBanner(message, content, 'dialog', (id) => root.closeDialog(id));
    try {
      root.showDialog(entry);
    } catch (error) {
      this.log.error('Dialog fallback failed, dropping message:', error);
      handle.dismiss();
      return fail('context-unavailable', 'Neither overlay nor dialog is available', error);
    }
    this.track(handle);
    this.log.debug('Banner shown as dialog', describeMessage(message));
    return ok(handle);
  }

  private createBanner(
    message: InboundMessage,
    content: BannerContent,
    presentation: BannerPresentation,
    removeFromRoot: (id: string) => void
  ): { handle: BannerHandle; entry: BannerEntry } {
    this.sequence += 1;
    const id = `banner-${this.sequence}`;
    let mounted = true;

    const remove = (): boolean => {
      if (!mounted) {
        return false;
      }
      mounted = false;
      this.forget(id);
      try {
        removeFromRoot(id);
      } catch (error) {
        this.log.error('Failed to remove banner:', error);
      }
      return true;
    };

    const handle: BannerHandle = {
      id,
      message,
      presentation,
      isMounted: () => mounted,
      dismiss: remove,
      tap: () => {
        if (!mounted) {
          return false;
        }
        this.runTapAction(message);
        remove();
        return true;
      },
    };

    // Not cancelled on manual removal; remove() is a no-op by then
    setTimeout(() => {
      if (remove()) {
        this.log.debug('Banner auto-dismissed', id);
      }
    }, this.autoDismissMs);

    const entry: BannerEntry = {
      id,
      ...content,
      onTap: () => {
        handle.tap();
      },
      onClose: () => {
        handle.dismiss();
      },
    };

    return { handle, entry };
  }

  private track(handle: BannerHandle): void {
    this.visible.push(handle);
    while (this.visible.length > this.maxVisibleBanners) {
      const oldest = this.visible[0];
      this.log.debug('Too many banners, removing oldest', oldest.id);
      oldest.dismiss();
    }
  }

  private forget(id: string): void {
    const index = this.visible.findIndex((handle) => handle.id === id);
    if (index !== -1) {
      this.visible.splice(index, 1);
    }
  }

  private runTapAction(message: InboundMessage): void {
    if (!this.onBannerTap) {
      this.log.debug('Banner tapped, no action registered', message.data);
      return;
    }
    try {
      this.onBannerTap(message);
    } catch (error) {
      this.log.error('Banner tap action failed:', error);
    }
  }

  private resolveRoot(): PresentationRoot | null {
    if (!this.rootAccessor) {
      return null;
    }
    try {
      return this.rootAccessor();
    } catch (error) {
      this.log.warn('Presentation root accessor failed:', error);
      return null;
    }
  }
}
