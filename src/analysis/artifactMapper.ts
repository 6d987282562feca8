import { EXTENSIONS } from '../utils/constants';
import { isSrcjarFile, normalizePath } from '../utils/pathUtils';

const AAPT2_SRCJAR = 'aapt2.srcjar';
const ANDROID_R_SRCJAR = 'android/R.srcjar';
const AAPT2_R_DIR = 'aapt2/R';

/**
 * Stateless mapping from generated-artifact names to the directories or
 * pseudo paths an IDE can attach.
 */
export class ArtifactMapper {
    /**
     * Directory holding the extracted R.java sources of a resource srcjar:
     *   x/aapt2.srcjar     → x/aapt2
     *   y/android/R.srcjar → y/aapt2/R
     * Any other srcjar returns null.
     */
    static deriveResourceDir(srcjarPath: string): string | null {
        const p = normalizePath(srcjarPath);
        if (p.endsWith(AAPT2_SRCJAR)) {
            return p.substring(0, p.length - EXTENSIONS.SRCJAR.length);
        }
        if (p === ANDROID_R_SRCJAR || p.endsWith('/' + ANDROID_R_SRCJAR)) {
            return p.substring(0, p.length - ANDROID_R_SRCJAR.length) + AAPT2_R_DIR;
        }
        return null;
    }

    /** Jar-root URL suffix used to attach a srcjar without extracting it. */
    static deriveJarPseudoPath(srcjarPath: string): string {
        return `${normalizePath(srcjarPath)}!/`;
    }

    /** Pseudo path for srcjars only; anything else yields null. */
    static toSrcjarPseudoPath(filePath: string): string | null {
        return isSrcjarFile(filePath) ? ArtifactMapper.deriveJarPseudoPath(filePath) : null;
    }
}
