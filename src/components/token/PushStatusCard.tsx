import { AlertCircle, CheckCircle2, Loader2 } from "lucide-react";
import type { PushInitState } from "@/hooks";

interface PushStatusCardProps {
  state: PushInitState;
  hasToken: boolean;
}

const PERMISSION_LABELS = {
  authorized: "Granted",
  provisional: "Provisional",
  denied: "Denied",
  "not-determined": "Not requested",
} as const;

export function PushStatusCard({ state, hasToken }: PushStatusCardProps) {
  if (state.status === "initializing") {
    return (
      <div className="flex items-center gap-3 p-4 rounded-xl bg-probe-bg-element">
        <Loader2 className="w-5 h-5 text-probe-text-accent animate-spin" />
        <span className="text-sm text-probe-text-accent">Setting up push messaging...</span>
      </div>
    );
  }

  const active = state.status === "ready" && hasToken;
  const permission = state.permission ? PERMISSION_LABELS[state.permission] : "Unknown";

  return (
    <div
      className={`flex items-start gap-3 p-4 rounded-xl border ${
        active ? "bg-green-500/10 border-green-500/40" : "bg-yellow-500/10 border-yellow-500/40"
      }`}
      data-testid="push-status"
    >
      {active ? (
        <CheckCircle2 className="w-6 h-6 text-green-500 flex-shrink-0" />
      ) : (
        <AlertCircle className="w-6 h-6 text-yellow-500 flex-shrink-0" />
      )}
      <div className="space-y-1">
        <p className={`text-sm font-bold ${active ? "text-green-400" : "text-yellow-400"}`}>
          {active ? "Status: Active" : "Status: Not receiving"}
        </p>
        <p className="text-xs text-probe-text-accent">Permission: {permission}</p>
        {state.error && (
          <p className="text-xs text-probe-text-accent">{state.error.message}</p>
        )}
      </div>
    </div>
  );
}
