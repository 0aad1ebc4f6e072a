const DRIVE_PATH = /^([A-Za-z]):[\\/]*(.*)$/
const WSL_SHARE_PATH = /^[\\/]{2}(?:wsl\$|wsl\.localhost)[\\/]+[^\\/]+(.*)$/i

/**
 * Translate a path on the Windows side into the form a WSL distribution sees.
 *
 * - `C:\Users\me\AppData\Local\Temp\x.sh` → `/mnt/c/Users/me/AppData/Local/Temp/x.sh`
 * - `\\wsl$\Ubuntu\tmp\x.sh` and `\\wsl.localhost\Ubuntu\tmp\x.sh` → `/tmp/x.sh`
 * - POSIX paths are returned unchanged
 */
export function toWslPath(hostPath: string): string {
	const share = WSL_SHARE_PATH.exec(hostPath)
	if (share) {
		const rest = (share[1] ?? '').replace(/\\/g, '/')
		return rest.startsWith('/') ? rest : `/${rest}`
	}

	const drive = DRIVE_PATH.exec(hostPath)
	if (drive) {
		const letter = (drive[1] ?? '').toLowerCase()
		const rest = (drive[2] ?? '').replace(/\\/g, '/')
		return rest ? `/mnt/${letter}/${rest}` : `/mnt/${letter}`
	}

	return hostPath.replace(/\\/g, '/')
}

const WINDOWS_DRIVE_MOUNT = /^\/mnt\/[A-Za-z](\/|$)/

/**
 * True when the path can only be reached from inside the distribution that owns it:
 * an absolute POSIX path that is not a Windows drive mounted under /mnt
 */
export function isDistroLocalPath(hostPath: string): boolean {
	return hostPath.startsWith('/') && !hostPath.startsWith('//') && !WINDOWS_DRIVE_MOUNT.test(hostPath)
}
