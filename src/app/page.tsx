"use client";

import { BellRing, Info, KeyRound, Loader2, RefreshCw } from "lucide-react";
import { PushStatusCard, TestingSteps, TokenDisplayField } from "@/components/token";
import { usePushInitializer, useRegistrationToken } from "@/hooks";
import { usePushServices } from "@/providers";

export default function TokenPage() {
  const { dispatcher } = usePushServices();
  const pushState = usePushInitializer();
  const { token, isRefreshing, refresh } = useRegistrationToken(pushState.status !== "initializing");

  const handleRefresh = async () => {
    await refresh();
    dispatcher.showToast("Token refreshed");
  };

  return (
    <main className="min-h-screen bg-probe-bg-dark">
      {/* Header */}
      <header className="flex items-center justify-between px-5 py-4 border-b border-probe-bg-element">
        <h1 className="text-lg font-bold text-probe-purple">Push Probe</h1>
        <button
          type="button"
          onClick={handleRefresh}
          disabled={isRefreshing}
          className="p-2 rounded-lg text-probe-text-accent hover:text-probe-purple hover:bg-probe-bg-element transition-colors disabled:opacity-50"
          aria-label="Refresh Token"
        >
          {isRefreshing ? (
            <Loader2 className="w-5 h-5 animate-spin" />
          ) : (
            <RefreshCw className="w-5 h-5" />
          )}
        </button>
      </header>

      <div className="max-w-xl mx-auto p-5 space-y-6">
        {/* Intro */}
        <section className="flex flex-col items-center text-center space-y-2 p-6 rounded-2xl bg-probe-bg-element">
          <BellRing className="w-14 h-14 text-probe-purple" />
          <h2 className="text-xl font-bold text-probe-purple">Firebase Cloud Messaging</h2>
          <p className="text-sm text-probe-text-accent">Ready to receive push notifications</p>
        </section>

        {/* Token */}
        <section className="p-5 rounded-2xl bg-probe-bg-element space-y-4">
          <div className="flex items-center gap-3">
            <KeyRound className="w-5 h-5 text-probe-text-accent" />
            <h2 className="text-base font-bold text-probe-text-primary">Registration Token</h2>
          </div>
          {pushState.status === "initializing" ? (
            <div className="flex items-center gap-3 py-6 justify-center">
              <Loader2 className="w-5 h-5 text-probe-text-accent animate-spin" />
              <span className="text-sm text-probe-text-accent">Loading token...</span>
            </div>
          ) : (
            <TokenDisplayField
              label="Token"
              value={token}
              onCopied={() => dispatcher.showToast("Token copied to clipboard")}
            />
          )}
        </section>

        {/* How to test */}
        <section className="p-5 rounded-2xl bg-probe-bg-element space-y-4">
          <div className="flex items-center gap-3">
            <Info className="w-5 h-5 text-probe-text-accent" />
            <h2 className="text-base font-bold text-probe-text-primary">How to Test</h2>
          </div>
          <TestingSteps />
        </section>

        {/* Status */}
        <PushStatusCard state={pushState} hasToken={token !== null} />
      </div>
    </main>
  );
}
