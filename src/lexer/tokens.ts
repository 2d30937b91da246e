export enum TokenType {
  // Literals
  STRING = 'STRING',
  NUMBER = 'NUMBER',
  IDENTIFIER = 'IDENTIFIER',

  // Delimiters
  LBRACKET = 'LBRACKET',       // [
  RBRACKET = 'RBRACKET',       // ]
  COMMA = 'COMMA',             // ,
  COLON = 'COLON',             // :

  // Statement keywords
  THE = 'THE',
  IS = 'IS',
  DISPLAY = 'DISPLAY',
  ASK = 'ASK',
  REMEMBER = 'REMEMBER',
  AS = 'AS',
  IF = 'IF',
  THEN = 'THEN',
  OTHERWISE = 'OTHERWISE',
  REPEAT = 'REPEAT',
  LOOPS = 'LOOPS',
  WHILE = 'WHILE',
  DO = 'DO',
  FOR = 'FOR',
  EACH = 'EACH',
  IN = 'IN',
  WRITE = 'WRITE',
  TO = 'TO',
  READ = 'READ',
  FROM = 'FROM',
  CSV = 'CSV',
  SET = 'SET',
  ROW = 'ROW',
  COLUMN = 'COLUMN',
  SECTION = 'SECTION',
  APPEND = 'APPEND',
  REMOVE = 'REMOVE',

  // Operator words
  PLUS = 'PLUS',
  MINUS = 'MINUS',
  TIMES = 'TIMES',
  DIVIDED = 'DIVIDED',
  BY = 'BY',
  EQUAL = 'EQUAL',
  GREATER = 'GREATER',
  LESS = 'LESS',
  THAN = 'THAN',
  AND = 'AND',
  OR = 'OR',
  AT = 'AT',
  GET = 'GET',
  LENGTH = 'LENGTH',
  OF = 'OF',
  COUNT = 'COUNT',

  // Structure
  EOF = 'EOF',
}

export const KEYWORDS: Record<string, TokenType> = {
  'the': TokenType.THE,
  'is': TokenType.IS,
  'display': TokenType.DISPLAY,
  'ask': TokenType.ASK,
  'remember': TokenType.REMEMBER,
  'as': TokenType.AS,
  'if': TokenType.IF,
  'then': TokenType.THEN,
  'otherwise': TokenType.OTHERWISE,
  'repeat': TokenType.REPEAT,
  'loops': TokenType.LOOPS,
  'while': TokenType.WHILE,
  'do': TokenType.DO,
  'for': TokenType.FOR,
  'each': TokenType.EACH,
  'in': TokenType.IN,
  'write': TokenType.WRITE,
  'to': TokenType.TO,
  'read': TokenType.READ,
  'from': TokenType.FROM,
  'csv': TokenType.CSV,
  'set': TokenType.SET,
  'row': TokenType.ROW,
  'column': TokenType.COLUMN,
  'section': TokenType.SECTION,
  'append': TokenType.APPEND,
  'remove': TokenType.REMOVE,
  'plus': TokenType.PLUS,
  'minus': TokenType.MINUS,
  'times': TokenType.TIMES,
  'divided': TokenType.DIVIDED,
  'by': TokenType.BY,
  'equal': TokenType.EQUAL,
  'greater': TokenType.GREATER,
  'less': TokenType.LESS,
  'than': TokenType.THAN,
  'and': TokenType.AND,
  'or': TokenType.OR,
  'at': TokenType.AT,
  'get': TokenType.GET,
  'length': TokenType.LENGTH,
  'of': TokenType.OF,
  'count': TokenType.COUNT,
};

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}
