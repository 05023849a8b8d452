import * as cheerio from 'cheerio'
import type { Cheerio, CheerioAPI } from 'cheerio'
import type { Element } from 'domhandler'
import { normalizeUrl } from '../utils/url.js'
import type { ContentBlock, ContentBlockKind } from '../filters/types.js'

export interface ExtractedPage {
  url: string
  title: string
  blocks: ContentBlock[]
  links: string[]
}

const ALWAYS_REMOVED = 'script, style, noscript, template, svg, canvas, iframe'
const BLOCK_SELECTOR = 'h1, h2, h3, h4, h5, h6, p, ul, ol, table, pre, blockquote'
// blocks nested inside these are rendered by their container
const CONTAINER_SELECTOR = 'ul, ol, table, pre, blockquote'

const collapse = (text: string): string => text.replace(/\s+/g, ' ').trim()

const countWords = (text: string): number => text.split(/\s+/).filter(Boolean).length

const resolveBase = (href: string | undefined, url: string): string => {
  if (!href) {
    return url
  }

  try {
    return new URL(href, url).href
  } catch {
    return url
  }
}

export function extractPage(html: string, url: string, excludedTags: readonly string[]): ExtractedPage {
  const $ = cheerio.load(html)
  const baseUrl = resolveBase($('base[href]').attr('href'), url)

  // --- Links are collected before anything is removed ---
  const links = new Set<string>()
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href')
    const normalized = href ? normalizeUrl(href, baseUrl) : undefined
    if (normalized) links.add(normalized)
  })

  const title =
    $('meta[property="og:title"]').attr('content')?.trim() ||
    $('title').first().text().trim() ||
    $('h1').first().text().trim() ||
    ''

  $(ALWAYS_REMOVED).remove()
  const excluded = excludedTags.filter(tag => /^[a-z][a-z0-9-]*$/i.test(tag))
  if (excluded.length > 0) {
    $(excluded.join(', ')).remove()
  }

  // --- Select best content root ---
  const contentRoot = $('main').first().length
    ? $('main').first()
    : $('article').first().length
      ? $('article').first()
      : $('[role="main"]').first().length
        ? $('[role="main"]').first()
        : $('body')

  const blocks: ContentBlock[] = []
  contentRoot.find(BLOCK_SELECTOR).each((_, el) => {
    const $el = $(el)
    if ($el.parents(CONTAINER_SELECTOR).length > 0) {
      return
    }

    const block = toBlock($, el, baseUrl)
    if (block) blocks.push(block)
  })

  return { url, title, blocks, links: [...links] }
}

export function renderBlocks(blocks: readonly ContentBlock[]): string {
  return blocks
    .map(block => block.markdown)
    .join('\n\n')
    .replace(/\n{3,}/g, '\n\n')
}

function toBlock($: CheerioAPI, el: Element, baseUrl: string): ContentBlock | undefined {
  const $el = $(el)
  const tag = el.tagName.toLowerCase()
  const text = collapse($el.text())
  if (!text) {
    return undefined
  }

  const linkText = $el
    .find('a')
    .map((_, a) => collapse($(a).text()))
    .get()
    .join('')
  const linkDensity = Math.min(1, linkText.length / text.length)

  const make = (kind: ContentBlockKind, markdown: string): ContentBlock => ({
    kind,
    markdown,
    text,
    wordCount: countWords(text),
    linkDensity
  })

  if (/^h[1-6]$/.test(tag)) {
    return make('heading', `${'#'.repeat(Number(tag[1]))} ${text}`)
  }

  if (tag === 'ul' || tag === 'ol') {
    const items = $el
      .children('li')
      .map((index, li) => {
        const marker = tag === 'ol' ? `${index + 1}.` : '-'
        return `${marker} ${inlineMarkdown($, $(li), baseUrl)}`
      })
      .get()
      .filter(item => item.length > 2)

    return items.length ? make('list', items.join('\n')) : undefined
  }

  if (tag === 'table') {
    const markdown = renderTable($, $el)
    return markdown ? make('table', markdown) : undefined
  }

  if (tag === 'pre') {
    return make('code', `\`\`\`\n${$el.text().replace(/\n+$/, '')}\n\`\`\``)
  }

  if (tag === 'blockquote') {
    return make('quote', `> ${inlineMarkdown($, $el, baseUrl)}`)
  }

  return make('paragraph', inlineMarkdown($, $el, baseUrl))
}

function renderTable($: CheerioAPI, $table: Cheerio<Element>): string {
  const rows = $table
    .find('tr')
    .toArray()
    .map(row =>
      $(row)
        .find('th, td')
        .toArray()
        .map(cell => collapse($(cell).text()).replace(/\|/g, '\\|'))
    )
    .filter(cells => cells.length > 0)

  const [header, ...body] = rows
  if (!header) {
    return ''
  }

  const line = (cells: string[]) => `| ${cells.join(' | ')} |`
  return [line(header), line(header.map(() => '---')), ...body.map(line)].join('\n')
}

/** Text of an element with links, emphasis and inline code kept as Markdown. */
function inlineMarkdown($: CheerioAPI, $el: Cheerio<Element>, baseUrl: string): string {
  const clone = $el.clone()

  clone.find('a[href]').each((_, a) => {
    const $a = $(a)
    const label = collapse($a.text())
    const href = normalizeUrl($a.attr('href') ?? '', baseUrl)
    $a.replaceWith($('<span></span>').text(href && label ? `[${label}](${href})` : label))
  })
  clone.find('strong, b').each((_, node) => {
    const $node = $(node)
    const label = collapse($node.text())
    $node.replaceWith($('<span></span>').text(label ? `**${label}**` : ''))
  })
  clone.find('em, i').each((_, node) => {
    const $node = $(node)
    const label = collapse($node.text())
    $node.replaceWith($('<span></span>').text(label ? `*${label}*` : ''))
  })
  clone.find('code').each((_, node) => {
    const $node = $(node)
    $node.replaceWith($('<span></span>').text(`\`${$node.text()}\``))
  })

  return collapse(clone.text())
}
