import { Cloud, Copy, Megaphone, Send, Terminal, type LucideIcon } from "lucide-react";

interface Step {
  text: string;
  icon: LucideIcon;
}

const STEPS: Step[] = [
  { text: "Copy the registration token above", icon: Copy },
  { text: "Open the Firebase console > Cloud Messaging", icon: Cloud },
  { text: "Create a new notification campaign", icon: Megaphone },
  { text: "Send a test message to the token", icon: Send },
  { text: "Watch the console logs for received messages", icon: Terminal },
];

export function TestingSteps() {
  return (
    <ol className="space-y-3">
      {STEPS.map(({ text, icon: Icon }, index) => (
        <li key={text} className="flex items-start gap-3">
          <span className="w-6 h-6 rounded-full bg-probe-purple/20 text-probe-purple text-xs font-bold flex items-center justify-center flex-shrink-0">
            {index + 1}
          </span>
          <span className="flex-1 text-sm text-probe-text-accent">{text}</span>
          <Icon className="w-4 h-4 text-probe-text-accent/70" aria-hidden="true" />
        </li>
      ))}
    </ol>
  );
}
