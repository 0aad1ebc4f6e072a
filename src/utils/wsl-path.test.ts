import { describe, it, expect } from 'vitest'
import { toWslPath, isDistroLocalPath } from './wsl-path.js'

describe('wsl-path', () => {
	describe('toWslPath', () => {
		it('should map a drive path under /mnt', () => {
			expect(toWslPath('C:\\Users\\alice\\AppData\\Local\\Temp\\wsl-tabs-1a2b.sh')).toBe(
				'/mnt/c/Users/alice/AppData/Local/Temp/wsl-tabs-1a2b.sh'
			)
		})

		it('should lowercase the drive letter', () => {
			expect(toWslPath('D:\\scripts\\run.sh')).toBe('/mnt/d/scripts/run.sh')
		})

		it('should accept forward slashes after the drive', () => {
			expect(toWslPath('e:/work/tabs.sh')).toBe('/mnt/e/work/tabs.sh')
		})

		it('should map a bare drive root', () => {
			expect(toWslPath('C:\\')).toBe('/mnt/c')
		})

		it('should map \\\\wsl$ share paths to the distribution root', () => {
			expect(toWslPath('\\\\wsl$\\Ubuntu\\tmp\\run.sh')).toBe('/tmp/run.sh')
		})

		it('should map \\\\wsl.localhost share paths to the distribution root', () => {
			expect(toWslPath('\\\\wsl.localhost\\Debian\\home\\bob\\run.sh')).toBe('/home/bob/run.sh')
		})

		it('should leave POSIX paths unchanged', () => {
			expect(toWslPath('/tmp/wsl-tabs-1a2b.sh')).toBe('/tmp/wsl-tabs-1a2b.sh')
		})
	})

	describe('isDistroLocalPath', () => {
		it('should recognise paths inside the distribution', () => {
			expect(isDistroLocalPath('/tmp/run.sh')).toBe(true)
			expect(isDistroLocalPath('/home/alice/scripts')).toBe(true)
		})

		it('should treat mounted Windows drives as shared', () => {
			expect(isDistroLocalPath('/mnt/c/Users/alice/AppData/Local/Temp')).toBe(false)
			expect(isDistroLocalPath('/mnt/d')).toBe(false)
		})

		it('should reject Windows paths', () => {
			expect(isDistroLocalPath('C:\\Temp\\run.sh')).toBe(false)
			expect(isDistroLocalPath('//server/share/run.sh')).toBe(false)
		})
	})
})
