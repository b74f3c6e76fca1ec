/**
 * Path classification tests
 */

import { ForbiddenError, MalformedRequestError } from '@pkgshelf/api'
import { describe, expect, it } from 'vitest'
import { classifyPath, isSafePath } from '../api/assets'

describe('classifyPath', () => {
  describe('local assets', () => {
    it.each(['github.css', 'logo.png', 'README', 'app.min.js'])(
      'classifies %s as local',
      (path) => {
        expect(classifyPath(path)).toEqual({ kind: 'local', name: path })
      },
    )

    it('keeps nested local paths whole', () => {
      expect(classifyPath('css/themes/dark.css')).toEqual({
        kind: 'local',
        name: 'css/themes/dark.css',
      })
    })

    it('ignores @ outside the leading segment', () => {
      expect(classifyPath('img/logo@2x.png')).toEqual({
        kind: 'local',
        name: 'img/logo@2x.png',
      })
    })
  })

  describe('remote assets', () => {
    it('splits package, version and nested file', () => {
      expect(classifyPath('vue@3.2.0/dist/vue.global.min.js')).toEqual({
        kind: 'remote',
        package: 'vue',
        version: '3.2.0',
        file: 'dist/vue.global.min.js',
      })
    })

    it('accepts a single file after the version', () => {
      expect(classifyPath('lodash@4.17.21/lodash.js')).toEqual({
        kind: 'remote',
        package: 'lodash',
        version: '4.17.21',
        file: 'lodash.js',
      })
    })

    it('keeps the scope in scoped package names', () => {
      expect(
        classifyPath('@highlightjs/cdn-assets@11.9.0/styles/github.min.css'),
      ).toEqual({
        kind: 'remote',
        package: '@highlightjs/cdn-assets',
        version: '11.9.0',
        file: 'styles/github.min.css',
      })
    })

    it('splits on the last @ of the leading segment', () => {
      expect(classifyPath('odd@name@1.0.0/index.js')).toEqual({
        kind: 'remote',
        package: 'odd@name',
        version: '1.0.0',
        file: 'index.js',
      })
    })

    it('accepts version ranges and tags', () => {
      expect(classifyPath('react@latest/umd/react.production.min.js')).toEqual({
        kind: 'remote',
        package: 'react',
        version: 'latest',
        file: 'umd/react.production.min.js',
      })
    })
  })

  describe('malformed paths', () => {
    it.each([
      ['', 'Empty asset path'],
      ['vue@/dist/vue.js', 'Empty package version'],
      ['vue@3.2.0', 'Missing file path after version'],
      ['vue@3.2.0/', 'Missing file path after version'],
      ['@scope', 'Missing version in package path'],
      ['@scope/pkg/index.js', 'Missing version in package path'],
      ['@scope/@1.0.0/index.js', 'Invalid scoped package name'],
      ['@/pkg@1.0.0/index.js', 'Invalid scoped package name'],
      ['vue@./dist/vue.js', 'Invalid package version'],
      ['vue@../lodash/4.17.21/lodash.js', 'Invalid package version'],
      ['..@1.0.0/index.js', 'Invalid package name'],
      ['@evil/..@react/18.2.0/index.js', 'Invalid scoped package name'],
      ['@../pkg@1.0.0/index.js', 'Invalid scoped package name'],
    ])('rejects %j', (path, message) => {
      expect(() => classifyPath(path)).toThrow(MalformedRequestError)
      expect(() => classifyPath(path)).toThrow(message)
    })
  })

  describe('unsafe paths', () => {
    it.each([
      '../secret.txt',
      'css/../../etc/passwd',
      'vue@3.2.0/../../x.js',
      './github.css',
      '/etc/passwd',
      'a//b.css',
      'a\\b.css',
      'C:/windows/win.ini',
    ])('forbids %j', (path) => {
      expect(isSafePath(path)).toBe(false)
      expect(() => classifyPath(path)).toThrow(ForbiddenError)
    })

    it('allows dots inside names', () => {
      expect(isSafePath('jquery@3.7.1/dist/jquery..min.js')).toBe(true)
      expect(isSafePath('.well-known.json')).toBe(true)
    })
  })
})
