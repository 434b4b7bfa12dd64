import { initializeApp } from 'firebase/app'
import { getStorage, type FirebaseStorage } from 'firebase/storage'
import type { FirebaseSettings } from './config'

/* Dictionaries can live in a Cloud Storage bucket instead of the bundled data folder. The web SDK
config only needs the project, bucket and app identifiers for read access to public objects. */
export function createFirebaseStorage(settings: FirebaseSettings): FirebaseStorage {
  if (!settings.storageBucket) {
    throw new Error('FIREBASE_STORAGE_BUCKET must be set when DICTIONARY_SOURCE=firebase')
  }
  const app = initializeApp({
    apiKey: settings.apiKey,
    projectId: settings.projectId,
    storageBucket: settings.storageBucket,
    appId: settings.appId,
  })
  return getStorage(app)
}
