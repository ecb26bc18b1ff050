"use client";

import { Copy, Check } from "lucide-react";
import { useTokenClipboard } from "@/hooks";

export const NO_TOKEN_TEXT = "No token available";

interface TokenDisplayFieldProps {
  /** Label displayed above the token */
  label: string;
  /** The full token, or null when none has been issued */
  value: string | null;
  /** Called after the token landed on the clipboard */
  onCopied?: () => void;
}

/**
 * TokenDisplayField Component
 *
 * Shows the full registration token as selectable text (tokens are pasted
 * into test sends, so nothing is truncated) with a copy button.
 */
export function TokenDisplayField({ label, value, onCopied }: TokenDisplayFieldProps) {
  const { copyToken, isCopied } = useTokenClipboard(value, onCopied);

  return (
    <div className="space-y-3">
      <label className="text-sm font-medium text-probe-text-primary">
        {label}
      </label>

      <div className="px-4 py-3 bg-probe-bg-dark/60 border border-probe-bg-hover rounded-xl">
        <span
          className="font-mono text-xs text-probe-text-primary break-all select-all"
          data-testid="token-value"
        >
          {value ?? NO_TOKEN_TEXT}
        </span>
      </div>

      <button
        type="button"
        onClick={() => void copyToken()}
        disabled={!value}
        className={`
          w-full flex items-center justify-center gap-2 py-3 rounded-xl font-semibold transition-all duration-200
          disabled:opacity-40 disabled:cursor-not-allowed
          ${isCopied
            ? "bg-green-600 text-white"
            : "bg-probe-purple text-probe-bg-dark hover:bg-probe-purple-hover"
          }
        `}
        aria-label={isCopied ? "Copied" : "Copy Token"}
      >
        {isCopied ? <Check className="w-5 h-5" /> : <Copy className="w-5 h-5" />}
        <span>{isCopied ? "Copied" : "Copy Token"}</span>
      </button>
    </div>
  );
}
