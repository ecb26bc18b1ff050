/**
 * Firebase Configuration
 *
 * Reads the Firebase web app settings from build-time environment
 * variables. Next.js only inlines NEXT_PUBLIC_* variables that are
 * accessed literally, so every key is read by name.
 */

import type { FirebaseOptions } from 'firebase/app';

export interface FirebaseSettings {
  options: FirebaseOptions;
  vapidKey: string | undefined;
}

export type FirebaseConfigResult =
  | { valid: true; settings: FirebaseSettings }
  | { valid: false; missing: string[] };

interface FirebaseEnv {
  apiKey?: string;
  authDomain?: string;
  projectId?: string;
  storageBucket?: string;
  messagingSenderId?: string;
  appId?: string;
  vapidKey?: string;
}

function readEnv(): FirebaseEnv {
  return {
    apiKey: process.env.NEXT_PUBLIC_FIREBASE_API_KEY,
    authDomain: process.env.NEXT_PUBLIC_FIREBASE_AUTH_DOMAIN,
    projectId: process.env.NEXT_PUBLIC_FIREBASE_PROJECT_ID,
    storageBucket: process.env.NEXT_PUBLIC_FIREBASE_STORAGE_BUCKET,
    messagingSenderId: process.env.NEXT_PUBLIC_FIREBASE_MESSAGING_SENDER_ID,
    appId: process.env.NEXT_PUBLIC_FIREBASE_APP_ID,
    vapidKey: process.env.NEXT_PUBLIC_FIREBASE_VAPID_KEY,
  };
}

// Messaging cannot mint a token without these
const REQUIRED_KEYS = [
  ['apiKey', 'NEXT_PUBLIC_FIREBASE_API_KEY'],
  ['projectId', 'NEXT_PUBLIC_FIREBASE_PROJECT_ID'],
  ['messagingSenderId', 'NEXT_PUBLIC_FIREBASE_MESSAGING_SENDER_ID'],
  ['appId', 'NEXT_PUBLIC_FIREBASE_APP_ID'],
] as const;

/**
 * Build the Firebase settings, reporting the variables that are missing.
 */
export function getFirebaseConfig(env: FirebaseEnv = readEnv()): FirebaseConfigResult {
  const missing = REQUIRED_KEYS
    .filter(([key]) => !env[key])
    .map(([, variable]) => variable);

  if (missing.length > 0) {
    return { valid: false, missing };
  }

  const options: FirebaseOptions = {
    apiKey: env.apiKey,
    authDomain: env.authDomain || undefined,
    projectId: env.projectId,
    storageBucket: env.storageBucket || undefined,
    messagingSenderId: env.messagingSenderId,
    appId: env.appId,
  };

  return {
    valid: true,
    settings: { options, vapidKey: env.vapidKey || undefined },
  };
}
