
export class DllNode<TVal> {
  private box: { val: TVal } | undefined;
  next?: DllNode<TVal>;
  prev?: DllNode<TVal>;
  private constructor(
    val: TVal
  ) {
    this.box = {
      val,
    };
  }

  $destroy() {
    delete this.box;
    delete this.next;
    delete this.prev;
  }

  get val(): TVal {
    if(this.box === undefined) {
      throw new Error('Attempt to access "val" of destroyed DllNode');
    }
    return this.box.val;
  }

  static init<I>(val: I): DllNode<I> {
    return new DllNode(val);
  }
}
