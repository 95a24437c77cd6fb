export const TEMPLATE_FILES = {
  contentBlock: "正文区块.html",
  blankLine: "空行.html",
  divider: "分割线.html",
  heading1: "一级标题.html",
  heading2: "二级标题.html",
  quote: "引用.html",
  text: "文本.html",
  image: "图片.html",
  bannerTop: "关注我们_top.html",
  bannerBottom: "关注我们_bottom.html",
  terminator: "结束符.html",
} as const

export type TemplateKey = keyof typeof TEMPLATE_FILES

export interface Template {
  name: string
  text: string
}

export type TemplateSet = Readonly<Record<TemplateKey, Template>>

type BlockBase<K extends string> = { kind: K; lines: string[] }

export type ParagraphBlock = BlockBase<"paragraph">
export type Heading1Block = BlockBase<"heading1"> & { title: string }
export type Heading2Block = BlockBase<"heading2"> & { title: string }
export type BlockquoteBlock = BlockBase<"blockquote">
export type FencedCodeBlock = BlockBase<"fenced-code"> & { fence: string; closed: boolean }
export type HrBlock = BlockBase<"hr">
export type ImageBlock = BlockBase<"image"> & { trailingText: string }
export type ListBlock = BlockBase<"list"> & { items: ListItem[] }
export type TableBlock = BlockBase<"table">
export type BlankBlock = BlockBase<"blank">

export type Block =
  | ParagraphBlock
  | Heading1Block
  | Heading2Block
  | BlockquoteBlock
  | FencedCodeBlock
  | HrBlock
  | ImageBlock
  | ListBlock
  | TableBlock
  | BlankBlock

export type BlockKind = Block["kind"]

export type ListMarker = "ul" | "ol"

export interface ListItem {
  marker: ListMarker
  depth: number
  text: string
}

export interface ListNode extends ListItem {
  children: ListNode[]
}

export interface Table {
  header: string[] | null
  rows: string[][]
  columnCount: number
}
